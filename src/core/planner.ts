import {
  BatchSpec,
  BatchSpecSchema,
  Ipv4Cidr,
  NodeKind,
  NodeSpec,
  NodeSpecSchema,
  ProvisionerSettings,
} from "../types/schemas";
import { AllocationError, ValidationError } from "./errors";

export const DEFAULT_PREFIX = 24;
export const MAX_HOST_OCTET = 254;

export interface ParsedBaseAddress {
  /** First three octets, e.g. "192.168.0" */
  network: string;
  hostOctet: number;
  prefix: number;
}

const ADDRESS_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})(?:\/(\d{1,2}))?$/;

/** Split `a.b.c.d[/prefix]`; the prefix defaults to /24. */
export function parseBaseAddress(value: string): ParsedBaseAddress {
  const match = ADDRESS_PATTERN.exec(value.trim());
  if (!match) {
    throw new ValidationError(`Malformed address "${value}": expected a.b.c.d or a.b.c.d/prefix`);
  }
  const octets = match.slice(1, 5).map(Number);
  if (octets.some(o => o > 255)) {
    throw new ValidationError(`Malformed address "${value}": octets must be 0-255`);
  }
  const prefix = match[5] === undefined ? DEFAULT_PREFIX : Number(match[5]);
  if (prefix < 1 || prefix > 32) {
    throw new ValidationError(`Malformed address "${value}": prefix must be 1-32`);
  }
  const hostOctet = octets[3];
  if (hostOctet < 1 || hostOctet > MAX_HOST_OCTET) {
    throw new ValidationError(`Malformed address "${value}": host octet must be 1-${MAX_HOST_OCTET}`);
  }
  return { network: octets.slice(0, 3).join("."), hostOctet, prefix };
}

export function parseCidr(value: string): Ipv4Cidr {
  const parsed = parseBaseAddress(value);
  return { ip: `${parsed.network}.${parsed.hostOctet}`, prefix: parsed.prefix };
}

function freeze(spec: NodeSpec): NodeSpec {
  Object.freeze(spec.address);
  Object.freeze(spec.sizing);
  return Object.freeze(spec);
}

function validateNode(candidate: unknown): NodeSpec {
  const result = NodeSpecSchema.safeParse(candidate);
  if (!result.success) {
    throw ValidationError.fromIssues("node", result.error.issues);
  }
  return freeze(result.data);
}

export interface NodeRequest {
  kind: NodeKind;
  id: number;
  hostname: string;
  address: string;
  gateway?: string;
  cores?: number;
  memoryMb?: number;
  diskGb?: number;
  privileged?: boolean;
  diskSize?: string;
}

/** Single-node path: fill unset fields from settings and validate. */
export function buildNodeSpec(request: NodeRequest, settings: ProvisionerSettings): NodeSpec {
  const sizing = request.kind === "lxc" ? settings.container : settings.vm;
  return validateNode({
    kind: request.kind,
    id: request.id,
    hostname: request.hostname,
    address: parseCidr(request.address),
    gateway: request.gateway ?? settings.network.gateway,
    dns: settings.network.dns,
    sizing: {
      cores: request.cores ?? sizing.cores,
      memoryMb: request.memoryMb ?? sizing.memory,
      diskGb: request.kind === "lxc" ? request.diskGb ?? settings.container.disk : undefined,
    },
    privileged: request.kind === "lxc" ? request.privileged ?? settings.container.privileged : false,
    diskSize: request.kind === "vm" ? request.diskSize : undefined,
  });
}

/**
 * Expand a batch into its ordered NodeSpecs. The whole batch is rejected
 * before anything is returned if one derived octet leaves the host range.
 */
export function planBatch(batch: BatchSpec, settings: ProvisionerSettings): NodeSpec[] {
  const checked = BatchSpecSchema.safeParse(batch);
  if (!checked.success) {
    throw ValidationError.fromIssues("batch", checked.error.issues);
  }
  const { kind, baseId, count, gateway, privileged } = checked.data;
  const base = parseBaseAddress(checked.data.baseAddress);

  if (base.hostOctet + count - 1 > MAX_HOST_OCTET) {
    const firstOverflow = MAX_HOST_OCTET + 1 - base.hostOctet;
    throw new AllocationError(firstOverflow, base.hostOctet + firstOverflow);
  }

  const sizing = kind === "lxc" ? settings.container : settings.vm;
  const plan: NodeSpec[] = [];
  for (let i = 0; i < count; i++) {
    plan.push(validateNode({
      kind,
      id: baseId + i,
      hostname: `${settings.hostname_prefix}-${i}`,
      address: { ip: `${base.network}.${base.hostOctet + i}`, prefix: base.prefix },
      gateway,
      dns: settings.network.dns,
      sizing: {
        cores: sizing.cores,
        memoryMb: sizing.memory,
        diskGb: kind === "lxc" ? settings.container.disk : undefined,
      },
      privileged: kind === "lxc" ? privileged : false,
    }));
  }
  return plan;
}

/** Validate and expand the identifier range the sweeps operate on. */
export function nodeIds(baseId: number, count: number): number[] {
  if (!Number.isInteger(baseId) || baseId < 1) {
    throw new ValidationError(`Base ID must be a positive integer, got ${baseId}`);
  }
  if (!Number.isInteger(count) || count < 1) {
    throw new ValidationError(`Count must be a positive integer, got ${count}`);
  }
  return Array.from({ length: count }, (_, i) => baseId + i);
}
