import { randomInt } from "crypto";
import type { NodeKind } from "../types/schemas";

/** Observed hypervisor truth for one identifier. Never cached. */
export type ResourceStatus =
  | { state: "absent" }
  | { state: "exists"; running: boolean };

export type ObservedState = "absent" | "stopped" | "running";

export function observedState(status: ResourceStatus): ObservedState {
  if (status.state === "absent") return "absent";
  return status.running ? "running" : "stopped";
}

/** Identity, sizing and network binding shared by both kinds. */
export interface GuestBinding {
  id: number;
  hostname: string;
  cores: number;
  memoryMb: number;
  /** CIDR form, e.g. 192.168.0.10/24 */
  address: string;
  gateway: string;
  dns: string;
  bridge: string;
}

/** A container is built from a template in one `create` call. */
export interface ContainerCreateRequest extends GuestBinding {
  diskGb: number;
  storage: string;
  privileged: boolean;
  template: string;
}

/** A restored VM gets its identity and cloud-init network in one `configure` call. */
export interface VmConfigureRequest extends GuestBinding {
  macAddress: string;
}

export function generateMac(prefix = "52:54:00", random: (max: number) => number = randomInt): string {
  const octets = Array.from({ length: 3 }, () => random(256).toString(16).toUpperCase().padStart(2, "0"));
  return `${prefix}:${octets.join(":")}`;
}

export interface GuestCommand {
  argv: readonly string[];
  input?: string;
}

/**
 * Command surface of the host's container/VM manager. Every method either
 * resolves or rejects with a CommandError carrying the failing invocation.
 * `create` is container-only; `configure` and `restoreFromImage` are VM-only.
 */
export interface Hypervisor {
  readonly kind: NodeKind;
  status(id: number): Promise<ResourceStatus>;
  create(request: ContainerCreateRequest): Promise<void>;
  configure(request: VmConfigureRequest): Promise<void>;
  start(id: number): Promise<void>;
  stop(id: number): Promise<void>;
  destroy(id: number): Promise<void>;
  /** Run a command inside the guest and return its stdout. */
  execInGuest(id: number, command: GuestCommand): Promise<string>;
  restoreFromImage(id: number, imagePath: string, storage: string): Promise<void>;
  resizeDisk(id: number, device: string, size: string): Promise<void>;
}
