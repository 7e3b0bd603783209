/**
 * Settings loader for the provisioner.
 * Reads an optional YAML or JSON file and fills every missing key with the
 * defaults declared in ProvisionerSettingsSchema.
 */

import fs from "fs";
import path from "path";
import YAML from "yaml";
import { ValidationError } from "../core/errors";
import { ProvisionerSettings, ProvisionerSettingsSchema } from "../types/schemas";

export const CONFIG_ENV_VAR = "NIXPROV_CONFIG";

export class SettingsManager {
  private settings: ProvisionerSettings;

  constructor(initial: unknown = {}) {
    this.settings = SettingsManager.parse(initial, "settings");
  }

  static fromFile(filePath: string): SettingsManager {
    if (!fs.existsSync(filePath)) {
      throw new ValidationError(`Config file not found: ${filePath}`);
    }
    const raw = fs.readFileSync(filePath, "utf8");
    let data: unknown;
    try {
      data = filePath.endsWith(".json") ? JSON.parse(raw) : YAML.parse(raw);
    } catch (error) {
      throw new ValidationError(`Config parse error in ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }
    // An empty YAML document parses to null
    return new SettingsManager(data ?? {});
  }

  /** Explicit path, then the environment variable, then built-in defaults. */
  static load(configPath?: string, env: NodeJS.ProcessEnv = process.env): SettingsManager {
    const p = configPath || env[CONFIG_ENV_VAR];
    return p ? SettingsManager.fromFile(path.resolve(p)) : new SettingsManager();
  }

  private static parse(data: unknown, subject: string): ProvisionerSettings {
    const result = ProvisionerSettingsSchema.safeParse(data);
    if (!result.success) {
      throw ValidationError.fromIssues(subject, result.error.issues);
    }
    return result.data;
  }

  getSettings(): ProvisionerSettings {
    return this.settings;
  }

  updateSettings(updates: Partial<ProvisionerSettings>): void {
    this.settings = SettingsManager.parse({ ...this.settings, ...updates }, "settings");
  }

  toYAML(): string {
    return YAML.stringify(this.settings);
  }
}
