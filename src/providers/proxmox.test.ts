import { beforeEach, describe, expect, it, vi } from "vitest";
import { CommandError, ValidationError } from "../core/errors";
import type { CommandResult, CommandRunner } from "./command-runner";
import { type ContainerCreateRequest, generateMac, type VmConfigureRequest } from "./hypervisor";
import { ProxmoxCli } from "./proxmox";

const ok = (stdout = ""): CommandResult => ({ exitCode: 0, stdout, stderr: "" });

const request: ContainerCreateRequest = {
  id: 100,
  hostname: "web-1",
  cores: 2,
  memoryMb: 1024,
  diskGb: 8,
  address: "192.168.0.100/24",
  gateway: "192.168.0.1",
  dns: "1.1.1.1",
  bridge: "vmbr0",
  storage: "local-btrfs",
  privileged: true,
  template: "/var/lib/vz/template/cache/nixos.tar.xz",
};

const vmRequest: VmConfigureRequest = {
  id: 300,
  hostname: "vm-1",
  cores: 2,
  memoryMb: 2048,
  address: "192.168.0.100/24",
  gateway: "192.168.0.1",
  dns: "1.1.1.1",
  bridge: "vmbr0",
  macAddress: "52:54:00:AB:CD:EF",
};

describe("ProxmoxCli", () => {
  let run: ReturnType<typeof vi.fn>;
  let runner: CommandRunner;

  beforeEach(() => {
    run = vi.fn().mockResolvedValue(ok());
    runner = { run };
  });

  describe("status", () => {
    it("reports a running container", async () => {
      run.mockResolvedValue(ok("status: running\n"));
      const pct = new ProxmoxCli({ kind: "lxc", runner });
      await expect(pct.status(100)).resolves.toEqual({ state: "exists", running: true });
      expect(run).toHaveBeenCalledWith("pct", ["status", "100"]);
    });

    it("reports a stopped VM", async () => {
      run.mockResolvedValue(ok("status: stopped\n"));
      const qm = new ProxmoxCli({ kind: "vm", runner });
      await expect(qm.status(300)).resolves.toEqual({ state: "exists", running: false });
      expect(run).toHaveBeenCalledWith("qm", ["status", "300"]);
    });

    it("maps a missing configuration file to absent", async () => {
      run.mockResolvedValue({ exitCode: 2, stdout: "", stderr: "Configuration file 'nodes/pve/lxc/100.conf' does not exist\n" });
      const pct = new ProxmoxCli({ kind: "lxc", runner });
      await expect(pct.status(100)).resolves.toEqual({ state: "absent" });
    });

    it("raises other failures", async () => {
      run.mockResolvedValue({ exitCode: 255, stdout: "", stderr: "ipcc_send_rec failed" });
      const pct = new ProxmoxCli({ kind: "lxc", runner });
      await expect(pct.status(100)).rejects.toThrow('Command "pct status 100" exited with code 255: ipcc_send_rec failed');
    });
  });

  it("creates a privileged container with nesting and forced overwrite", async () => {
    const pct = new ProxmoxCli({ kind: "lxc", runner });
    await pct.create(request);
    expect(run).toHaveBeenCalledWith("pct", [
      "create", "100", "/var/lib/vz/template/cache/nixos.tar.xz",
      "--arch", "amd64",
      "--ostype", "unmanaged",
      "--hostname", "web-1",
      "--cores", "2",
      "--memory", "1024",
      "--swap", "0",
      "--rootfs", "local-btrfs:8",
      "--net0", "name=eth0,bridge=vmbr0",
      "--unprivileged", "0",
      "--features", "nesting=1",
      "--force", "1",
    ], { input: undefined });
  });

  it("marks unprivileged containers", async () => {
    const pct = new ProxmoxCli({ kind: "lxc", runner });
    await pct.create({ ...request, privileged: false });
    const args: string[] = run.mock.calls[0][1];
    expect(args[args.indexOf("--unprivileged") + 1]).toBe("1");
  });

  it("configures a restored VM with cloud-init network and the given MAC", async () => {
    const qm = new ProxmoxCli({ kind: "vm", runner });
    await qm.configure(vmRequest);
    expect(run).toHaveBeenCalledWith("qm", [
      "set", "300",
      "--name", "vm-1",
      "--cores", "2",
      "--memory", "2048",
      "--ipconfig0", "ip=192.168.0.100/24,gw=192.168.0.1",
      "--nameserver", "1.1.1.1",
      "--net0", "virtio,bridge=vmbr0,macaddr=52:54:00:AB:CD:EF",
    ], { input: undefined });
  });

  it("restores a VM from a VMA archive", async () => {
    const qm = new ProxmoxCli({ kind: "vm", runner });
    await qm.restoreFromImage(300, "/dump/nixos.vma.zst", "local-btrfs");
    expect(run).toHaveBeenCalledWith(
      "qmrestore",
      ["/dump/nixos.vma.zst", "300", "--unique", "true", "--storage", "local-btrfs"],
      { input: undefined },
    );
  });

  it("resizes a disk", async () => {
    const qm = new ProxmoxCli({ kind: "vm", runner });
    await qm.resizeDisk(300, "scsi0", "32G");
    expect(run).toHaveBeenCalledWith("qm", ["resize", "300", "scsi0", "32G"], { input: undefined });
  });

  describe("kind-specific operations", () => {
    it("refuses a template create for VMs", async () => {
      const qm = new ProxmoxCli({ kind: "vm", runner });
      await expect(qm.create(request)).rejects.toThrow(
        new ValidationError("Proxmox vm nodes do not support template create; it is lxc-only"),
      );
      expect(run).not.toHaveBeenCalled();
    });

    it("refuses configure and image restore for containers", async () => {
      const pct = new ProxmoxCli({ kind: "lxc", runner });
      await expect(pct.configure(vmRequest)).rejects.toThrow(
        "Proxmox lxc nodes do not support configure; it is vm-only",
      );
      await expect(pct.restoreFromImage(100, "/dump/nixos.vma.zst", "local-btrfs")).rejects.toBeInstanceOf(ValidationError);
      expect(run).not.toHaveBeenCalled();
    });
  });

  it("raises CommandError when destroy fails", async () => {
    run.mockResolvedValue({ exitCode: 1, stdout: "", stderr: "CT is locked" });
    const pct = new ProxmoxCli({ kind: "lxc", runner });
    const failure = pct.destroy(100);
    await expect(failure).rejects.toBeInstanceOf(CommandError);
    await expect(failure).rejects.toMatchObject({ exitCode: 1, stderr: "CT is locked" });
  });

  describe("execInGuest", () => {
    it("pipes input through pct exec", async () => {
      run.mockResolvedValue(ok("written"));
      const pct = new ProxmoxCli({ kind: "lxc", runner });
      const out = await pct.execInGuest(100, { argv: ["/bin/tee", "/etc/nixos/configuration.nix"], input: "{ }" });
      expect(out).toBe("written");
      expect(run).toHaveBeenCalledWith("pct", ["exec", "100", "--", "/bin/tee", "/etc/nixos/configuration.nix"], { input: "{ }" });
    });

    it("passes stdin to the QEMU guest agent and returns its output", async () => {
      run.mockResolvedValue(ok(JSON.stringify({ exitcode: 0, exited: 1, "out-data": "done\n" })));
      const qm = new ProxmoxCli({ kind: "vm", runner, execTimeoutS: 60 });
      const out = await qm.execInGuest(300, { argv: ["/bin/tee", "/etc/x"], input: "data" });
      expect(out).toBe("done\n");
      expect(run).toHaveBeenCalledWith(
        "qm",
        ["guest", "exec", "300", "--timeout", "60", "--pass-stdin", "1", "--", "/bin/tee", "/etc/x"],
        { input: "data" },
      );
    });

    it("raises the guest command's exit code", async () => {
      run.mockResolvedValue(ok(JSON.stringify({ exitcode: 3, exited: 1, "err-data": "error: syntax" })));
      const qm = new ProxmoxCli({ kind: "vm", runner });
      await expect(qm.execInGuest(300, { argv: ["nixos-rebuild", "switch"] })).rejects.toMatchObject({
        exitCode: 3,
        stderr: "error: syntax",
      });
    });

    it("fails when the guest command is still running", async () => {
      run.mockResolvedValue(ok(JSON.stringify({ pid: 1234 })));
      const qm = new ProxmoxCli({ kind: "vm", runner, execTimeoutS: 5 });
      await expect(qm.execInGuest(300, { argv: ["sleep", "60"] })).rejects.toThrow(/still running after 5s/);
    });

    it("fails on a reply that is not JSON", async () => {
      run.mockResolvedValue(ok("QEMU guest agent is not running"));
      const qm = new ProxmoxCli({ kind: "vm", runner });
      await expect(qm.execInGuest(300, { argv: ["true"] })).rejects.toThrow(/unreadable guest agent reply/);
    });
  });
});

describe("generateMac", () => {
  it("keeps the prefix and appends three random octets", () => {
    const values = [0, 15, 255];
    expect(generateMac("52:54:00", () => values.shift() ?? 0)).toBe("52:54:00:00:0F:FF");
  });
});
