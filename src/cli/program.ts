import { Command, Option } from "commander";
import fs from "fs";
import path from "path";
import { SettingsManager } from "../config/settings";
import { BatchCoordinator } from "../core/batch-coordinator";
import { errorMessage, ProvisionerError, ValidationError } from "../core/errors";
import { NodeOrchestrator } from "../core/orchestrator";
import { buildNodeSpec, NodeRequest } from "../core/planner";
import { Logger, LogLevel, parseLogLevel } from "../logging/logger";
import { ChildProcessRunner } from "../providers/command-runner";
import { Hypervisor } from "../providers/hypervisor";
import { ProxmoxCli } from "../providers/proxmox";
import { NodeKind, NodeKindSchema, ProvisionerSettings, ProvisionerSettingsSchema } from "../types/schemas";

export interface CliDeps {
  createHypervisor(kind: NodeKind, settings: ProvisionerSettings): Hypervisor;
  createLogger(level: LogLevel): Logger;
  /** Plain output that is not a diagnostic (JSON, generated files). */
  write(text: string): void;
  setExitCode(code: number): void;
  env: NodeJS.ProcessEnv;
}

type GlobalOptions = {
  config?: string;
  logLevel?: string;
};

export function defaultDeps(): CliDeps {
  const runner = new ChildProcessRunner();
  return {
    createHypervisor: (kind, settings) =>
      new ProxmoxCli({
        kind,
        runner,
        interfaceName: settings.network.interface,
        arch: settings.container.arch,
        ostype: settings.container.ostype,
        nesting: settings.container.nesting,
        swap: settings.container.swap,
        execTimeoutS: settings.vm.exec_timeout_s,
      }),
    createLogger: level => new Logger({ level }),
    write: text => process.stdout.write(text.endsWith("\n") ? text : `${text}\n`),
    setExitCode: code => {
      process.exitCode = code;
    },
    env: process.env,
  };
}

function parseInteger(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ValidationError(`${name} must be an integer, got "${value}"`);
  }
  return Number(value);
}

function requireInteger(value: string, name: string): number {
  const parsed = parseInteger(value, name);
  if (parsed === undefined) {
    throw new ValidationError(`${name} is required`);
  }
  return parsed;
}

function parseFlag(value: string | undefined, name: string): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (["1", "yes", "true"].includes(normalized)) return true;
  if (["0", "no", "false"].includes(normalized)) return false;
  throw new ValidationError(`${name} must be 1 or 0, got "${value}"`);
}

function parseKind(value: string): NodeKind {
  const result = NodeKindSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`--kind must be lxc or vm, got "${value}"`);
  }
  return result.data;
}

const kindOption = () => new Option("--kind <kind>", "node kind: lxc or vm").default("lxc");

export function buildProgram(deps: CliDeps = defaultDeps()): Command {
  const program = new Command();

  program
    .name("nixprov")
    .description("Provision NixOS containers and VMs on a Proxmox VE host")
    .version("0.3.0")
    .option("-c, --config <path>", "Path to settings file (YAML or JSON)")
    .option("--log-level <level>", "debug, info, warn or error");

  const context = () => {
    const globals = program.opts<GlobalOptions>();
    const manager = SettingsManager.load(globals.config, deps.env);
    const settings = manager.getSettings();
    let level: LogLevel;
    try {
      level = parseLogLevel(globals.logLevel ?? settings.logging.level);
    } catch (error) {
      throw new ValidationError(errorMessage(error));
    }
    return { settings, logger: deps.createLogger(level) };
  };

  // Every failure becomes exit code 1 with a diagnostic line
  const guarded = <A extends unknown[]>(action: (...args: A) => Promise<boolean>) =>
    async (...args: A): Promise<void> => {
      try {
        const ok = await action(...args);
        deps.setExitCode(ok ? 0 : 1);
      } catch (error) {
        const logger = deps.createLogger(LogLevel.INFO);
        const prefix = error instanceof ProvisionerError ? "" : "Unexpected failure: ";
        logger.error(`${prefix}${errorMessage(error)}`, error instanceof Error ? error : undefined);
        deps.setExitCode(1);
      }
    };

  const provisionSingle = async (request: NodeRequest): Promise<boolean> => {
    const { settings, logger } = context();
    const node = buildNodeSpec(request, settings);
    const orchestrator = new NodeOrchestrator(deps.createHypervisor(node.kind, settings), settings, logger);
    const outcome = await orchestrator.provision(node);
    return outcome.status === "succeeded";
  };

  program
    .command("create")
    .description("Create or recreate one NixOS container")
    .argument("<id>", "container ID")
    .argument("<hostname>", "hostname")
    .argument("<address>", "IPv4 address with prefix, e.g. 192.168.0.100/24")
    .argument("[gateway]", "default gateway")
    .argument("[cores]", "CPU cores")
    .argument("[memory]", "memory in MB")
    .argument("[disk]", "root disk in GB")
    .argument("[privileged]", "1 for privileged, 0 for unprivileged")
    .action(guarded(async (
      id: string,
      hostname: string,
      address: string,
      gateway: string | undefined,
      cores: string | undefined,
      memory: string | undefined,
      disk: string | undefined,
      privileged: string | undefined,
    ) => provisionSingle({
      kind: "lxc",
      id: requireInteger(id, "ID"),
      hostname,
      address,
      gateway,
      cores: parseInteger(cores, "cores"),
      memoryMb: parseInteger(memory, "memory"),
      diskGb: parseInteger(disk, "disk"),
      privileged: parseFlag(privileged, "privileged"),
    })));

  program
    .command("create-vm")
    .description("Restore a NixOS VM from the VMA image and configure it")
    .argument("<id>", "VM ID")
    .argument("<hostname>", "hostname")
    .argument("<address>", "IPv4 address with prefix, e.g. 192.168.0.100/24")
    .argument("[gateway]", "default gateway")
    .argument("[cores]", "CPU cores")
    .argument("[memory]", "memory in MB")
    .argument("[disk-size]", "grow the system disk to this size, e.g. 32G")
    .action(guarded(async (
      id: string,
      hostname: string,
      address: string,
      gateway: string | undefined,
      cores: string | undefined,
      memory: string | undefined,
      diskSize: string | undefined,
    ) => provisionSingle({
      kind: "vm",
      id: requireInteger(id, "ID"),
      hostname,
      address,
      gateway,
      cores: parseInteger(cores, "cores"),
      memoryMb: parseInteger(memory, "memory"),
      diskSize,
    })));

  program
    .command("deploy-cluster")
    .description("Create a contiguous cluster of nodes")
    .argument("<base_id>", "first node ID")
    .argument("<count>", "number of nodes")
    .argument("<base_address>", "first node address, e.g. 192.168.0.100/24")
    .argument("[gateway]", "default gateway")
    .argument("[privileged]", "1 for privileged, 0 for unprivileged (containers only)")
    .addOption(kindOption())
    .action(guarded(async (
      baseId: string,
      count: string,
      baseAddress: string,
      gateway: string | undefined,
      privileged: string | undefined,
      opts: { kind: string },
    ) => {
      const { settings, logger } = context();
      const kind = parseKind(opts.kind);
      const coordinator = new BatchCoordinator(deps.createHypervisor(kind, settings), settings, logger);
      const report = await coordinator.deploy({
        kind,
        baseId: requireInteger(baseId, "base ID"),
        count: requireInteger(count, "count"),
        baseAddress,
        gateway: gateway ?? settings.network.gateway,
        privileged: parseFlag(privileged, "privileged") ?? settings.container.privileged,
      });
      return report.succeeded;
    }));

  program
    .command("check")
    .description("Show state and gateway reachability of a range of nodes")
    .argument("<base_id>", "first node ID")
    .argument("<count>", "number of nodes")
    .addOption(kindOption())
    .option("--gateway <address>", "address to ping from each guest")
    .option("--json", "print the report as JSON", false)
    .action(guarded(async (
      baseId: string,
      count: string,
      opts: { kind: string; gateway?: string; json: boolean },
    ) => {
      const { settings, logger } = context();
      const coordinator = new BatchCoordinator(deps.createHypervisor(parseKind(opts.kind), settings), settings, logger);
      const reports = await coordinator.status(requireInteger(baseId, "base ID"), requireInteger(count, "count"), opts.gateway);
      if (opts.json) {
        deps.write(JSON.stringify(reports, null, 2));
      } else {
        for (const report of reports) {
          if (report.addresses) deps.write(`--- ${report.id} ---\n${report.addresses.trimEnd()}`);
        }
      }
      return true;
    }));

  program
    .command("cleanup")
    .description("Stop and destroy a range of nodes")
    .argument("<base_id>", "first node ID")
    .argument("<count>", "number of nodes")
    .addOption(kindOption())
    .action(guarded(async (baseId: string, count: string, opts: { kind: string }) => {
      const { settings, logger } = context();
      const coordinator = new BatchCoordinator(deps.createHypervisor(parseKind(opts.kind), settings), settings, logger);
      await coordinator.teardown(requireInteger(baseId, "base ID"), requireInteger(count, "count"));
      return true;
    }));

  program
    .command("config:init")
    .description("Write a settings file holding every default")
    .option("-o, --output <path>", "Output path", "./nixprov.yaml")
    .action(guarded(async (opts: { output: string }) => {
      const out = path.resolve(opts.output);
      fs.writeFileSync(out, new SettingsManager().toYAML(), "utf8");
      deps.write(`Wrote default settings to ${out}`);
      return true;
    }));

  program
    .command("validate")
    .description("Validate the settings file")
    .action(guarded(async () => {
      const { settings } = context();
      deps.write("Configuration is valid.");
      deps.write(`Storage: ${settings.storage}, bridge: ${settings.network.bridge}, gateway: ${settings.network.gateway}`);
      return true;
    }));

  program
    .command("schema:emit")
    .description("Emit the JSON Schema of the settings file")
    .option("-o, --output <path>", "Output file", "./docs/settings.schema.json")
    .action(guarded(async (opts: { output: string }) => {
      const { zodToJsonSchema } = await import("zod-to-json-schema");
      const schema = zodToJsonSchema(ProvisionerSettingsSchema, "ProvisionerSettings");
      fs.mkdirSync(path.dirname(opts.output), { recursive: true });
      fs.writeFileSync(opts.output, JSON.stringify(schema, null, 2));
      deps.write(`Wrote JSON Schema to ${opts.output}`);
      return true;
    }));

  return program;
}
