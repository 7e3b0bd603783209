import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ValidationError } from "../core/errors";
import { CONFIG_ENV_VAR, SettingsManager } from "./settings";

describe("SettingsManager", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "nixprov-settings-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const write = (name: string, content: string): string => {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content, "utf8");
    return file;
  };

  it("fills every default", () => {
    const settings = new SettingsManager().getSettings();
    expect(settings.storage).toBe("local-btrfs");
    expect(settings.hostname_prefix).toBe("node");
    expect(settings.network).toEqual({ bridge: "vmbr0", interface: "eth0", gateway: "192.168.0.1", dns: "1.1.1.1" });
    expect(settings.container.readiness).toEqual({ interval_ms: 1000, max_attempts: 30 });
    expect(settings.container.privileged).toBe(true);
    expect(settings.vm.memory).toBe(2048);
    expect(settings.vm.settle_delay_ms).toBe(30000);
    expect(settings.guest.activation_command).toBe("nixos-rebuild switch");
  });

  it("merges a YAML file over the defaults", () => {
    const file = write("nixprov.yaml", [
      "storage: local-zfs",
      "network:",
      "  gateway: 10.0.0.1",
      "container:",
      "  cores: 4",
      "",
    ].join("\n"));

    const settings = SettingsManager.fromFile(file).getSettings();

    expect(settings.storage).toBe("local-zfs");
    expect(settings.network.gateway).toBe("10.0.0.1");
    expect(settings.network.dns).toBe("1.1.1.1");
    expect(settings.container.cores).toBe(4);
    expect(settings.container.memory).toBe(1024);
  });

  it("reads JSON files", () => {
    const file = write("nixprov.json", JSON.stringify({ hostname_prefix: "edge" }));
    expect(SettingsManager.fromFile(file).getSettings().hostname_prefix).toBe("edge");
  });

  it("treats an empty file as all defaults", () => {
    const file = write("empty.yaml", "");
    expect(SettingsManager.fromFile(file).getSettings().storage).toBe("local-btrfs");
  });

  it("rejects unknown top-level keys", () => {
    expect(() => new SettingsManager({ storagee: "x" })).toThrow(ValidationError);
  });

  it("names the offending path", () => {
    expect(() => new SettingsManager({ network: { gateway: "not-an-ip" } })).toThrow(/^Invalid settings: network\.gateway: /);
  });

  it("rejects a missing file", () => {
    expect(() => SettingsManager.fromFile(path.join(dir, "absent.yaml"))).toThrow(/^Config file not found: /);
  });

  it("rejects a file that does not parse", () => {
    const file = write("broken.json", "{ storage: ");
    expect(() => SettingsManager.fromFile(file)).toThrow(/^Config parse error in /);
  });

  it("prefers the explicit path, then the environment variable", () => {
    const explicit = write("a.yaml", "storage: from-flag\n");
    const fromEnv = write("b.yaml", "storage: from-env\n");
    const env = { [CONFIG_ENV_VAR]: fromEnv };

    expect(SettingsManager.load(explicit, env).getSettings().storage).toBe("from-flag");
    expect(SettingsManager.load(undefined, env).getSettings().storage).toBe("from-env");
    expect(SettingsManager.load(undefined, {}).getSettings().storage).toBe("local-btrfs");
  });

  it("re-validates updates and round-trips through YAML", () => {
    const manager = new SettingsManager();
    manager.updateSettings({ storage: "ceph" });
    expect(manager.getSettings().storage).toBe("ceph");
    expect(() => manager.updateSettings({ hostname_prefix: "bad_prefix!" })).toThrow(ValidationError);

    const file = write("dump.yaml", manager.toYAML());
    expect(SettingsManager.fromFile(file).getSettings()).toEqual(manager.getSettings());
  });
});
