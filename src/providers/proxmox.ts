import { z } from "zod";
import { CommandError, ValidationError } from "../core/errors";
import type { NodeKind } from "../types/schemas";
import { CommandRunner, formatCommand } from "./command-runner";
import type {
  ContainerCreateRequest,
  GuestCommand,
  Hypervisor,
  ResourceStatus,
  VmConfigureRequest,
} from "./hypervisor";

export interface ProxmoxCliOptions {
  kind: NodeKind;
  runner: CommandRunner;
  /** Guest NIC name inside containers. */
  interfaceName?: string;
  arch?: string;
  ostype?: string;
  nesting?: boolean;
  swap?: number;
  /** Seconds `qm guest exec` waits for the guest command. */
  execTimeoutS?: number;
}

const MISSING_RESOURCE = /does not exist/i;

const GuestExecResultSchema = z.object({
  exitcode: z.number().int().optional(),
  exited: z.union([z.boolean(), z.number()]).optional(),
  "out-data": z.string().optional(),
  "err-data": z.string().optional(),
  pid: z.number().int().optional(),
});

/**
 * Hypervisor backed by the Proxmox VE command line: `pct` for LXC
 * containers, `qm`/`qmrestore` for QEMU virtual machines.
 */
export class ProxmoxCli implements Hypervisor {
  readonly kind: NodeKind;
  private readonly runner: CommandRunner;
  private readonly interfaceName: string;
  private readonly arch: string;
  private readonly ostype: string;
  private readonly nesting: boolean;
  private readonly swap: number;
  private readonly execTimeoutS: number;

  constructor(options: ProxmoxCliOptions) {
    this.kind = options.kind;
    this.runner = options.runner;
    this.interfaceName = options.interfaceName ?? "eth0";
    this.arch = options.arch ?? "amd64";
    this.ostype = options.ostype ?? "unmanaged";
    this.nesting = options.nesting ?? true;
    this.swap = options.swap ?? 0;
    this.execTimeoutS = options.execTimeoutS ?? 1800;
  }

  private get tool(): string {
    return this.kind === "lxc" ? "pct" : "qm";
  }

  private async invoke(file: string, args: readonly string[], input?: string): Promise<string> {
    const result = await this.runner.run(file, args, { input });
    if (result.exitCode !== 0) {
      throw new CommandError(formatCommand(file, args), result.exitCode, result.stderr);
    }
    return result.stdout;
  }

  async status(id: number): Promise<ResourceStatus> {
    const args = ["status", String(id)];
    const result = await this.runner.run(this.tool, args);
    if (result.exitCode !== 0) {
      if (MISSING_RESOURCE.test(result.stderr)) {
        return { state: "absent" };
      }
      throw new CommandError(formatCommand(this.tool, args), result.exitCode, result.stderr);
    }
    return { state: "exists", running: /status:\s*running/.test(result.stdout) };
  }

  async create(request: ContainerCreateRequest): Promise<void> {
    this.requireKind("lxc", "template create");
    await this.invoke("pct", [
      "create", String(request.id), request.template,
      "--arch", this.arch,
      "--ostype", this.ostype,
      "--hostname", request.hostname,
      "--cores", String(request.cores),
      "--memory", String(request.memoryMb),
      "--swap", String(this.swap),
      "--rootfs", `${request.storage}:${request.diskGb}`,
      "--net0", `name=${this.interfaceName},bridge=${request.bridge}`,
      "--unprivileged", request.privileged ? "0" : "1",
      "--features", `nesting=${this.nesting ? 1 : 0}`,
      "--force", "1"
    ]);
  }

  async configure(request: VmConfigureRequest): Promise<void> {
    this.requireKind("vm", "configure");
    await this.invoke("qm", [
      "set", String(request.id),
      "--name", request.hostname,
      "--cores", String(request.cores),
      "--memory", String(request.memoryMb),
      "--ipconfig0", `ip=${request.address},gw=${request.gateway}`,
      "--nameserver", request.dns,
      "--net0", `virtio,bridge=${request.bridge},macaddr=${request.macAddress}`
    ]);
  }

  async start(id: number): Promise<void> {
    await this.invoke(this.tool, ["start", String(id)]);
  }

  async stop(id: number): Promise<void> {
    await this.invoke(this.tool, ["stop", String(id)]);
  }

  async destroy(id: number): Promise<void> {
    await this.invoke(this.tool, ["destroy", String(id)]);
  }

  async execInGuest(id: number, command: GuestCommand): Promise<string> {
    if (this.kind === "lxc") {
      return this.invoke("pct", ["exec", String(id), "--", ...command.argv], command.input);
    }

    const args = [
      "guest", "exec", String(id),
      "--timeout", String(this.execTimeoutS),
      ...(command.input !== undefined ? ["--pass-stdin", "1"] : []),
      "--", ...command.argv
    ];
    const stdout = await this.invoke("qm", args, command.input);
    const display = formatCommand("qm", args);

    let parsed: unknown;
    try {
      parsed = JSON.parse(stdout);
    } catch {
      throw new CommandError(display, 1, `unreadable guest agent reply: ${stdout.trim()}`);
    }
    const reply = GuestExecResultSchema.safeParse(parsed);
    if (!reply.success) {
      throw new CommandError(display, 1, `unexpected guest agent reply: ${stdout.trim()}`);
    }
    const { exitcode, exited } = reply.data;
    if (!exited || exitcode === undefined) {
      throw new CommandError(display, 1, `guest command still running after ${this.execTimeoutS}s`);
    }
    if (exitcode !== 0) {
      throw new CommandError(display, exitcode, reply.data["err-data"] ?? "");
    }
    return reply.data["out-data"] ?? "";
  }

  async restoreFromImage(id: number, imagePath: string, storage: string): Promise<void> {
    this.requireKind("vm", "image restore");
    await this.invoke("qmrestore", [imagePath, String(id), "--unique", "true", "--storage", storage]);
  }

  async resizeDisk(id: number, device: string, size: string): Promise<void> {
    await this.invoke(this.tool, ["resize", String(id), device, size]);
  }

  private requireKind(kind: NodeKind, operation: string): void {
    if (this.kind !== kind) {
      throw new ValidationError(`Proxmox ${this.kind} nodes do not support ${operation}; it is ${kind}-only`);
    }
  }
}
