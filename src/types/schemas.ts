import { z } from "zod";

const DEFAULT_TEMPLATE = "/var/lib/pve/local-btrfs/template/cache/nixos-24.05-default_20241108_amd64.tar.xz";
const DEFAULT_VM_IMAGE = "/var/lib/pve/local-btrfs/dump/vzdump-qemu-nixos-24.11.vma.zst";

const HOSTNAME_PATTERN = /^[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?$/i;
const PACKAGE_PATTERN = /^[A-Za-z0-9._+-]+$/;
const ABSOLUTE_PATH = /^\/[^\s]*$/;
const DISK_SIZE_PATTERN = /^\+?\d+[KMGT]?$/;

export const NodeKindSchema = z.enum(["lxc", "vm"]);

export const Ipv4AddressSchema = z.string().ip({ version: "v4" });

export const HostnameSchema = z.string().regex(HOSTNAME_PATTERN, "must be a valid hostname label");

export const ContainerSettingsSchema = z.object({
  template: z.string().regex(ABSOLUTE_PATH).default(DEFAULT_TEMPLATE),
  arch: z.enum(["amd64", "arm64", "i386"]).default("amd64"),
  ostype: z.string().min(1).default("unmanaged"),
  nesting: z.boolean().default(true),
  swap: z.number().int().min(0).default(0),
  cores: z.number().int().positive().default(2),
  memory: z.number().int().positive().default(1024),
  disk: z.number().int().positive().default(8),
  privileged: z.boolean().default(true),
  readiness: z.object({
    interval_ms: z.number().int().min(0).default(1000),
    max_attempts: z.number().int().min(1).max(600).default(30),
  }).default({}),
});

export const VmSettingsSchema = z.object({
  image: z.string().regex(ABSOLUTE_PATH).default(DEFAULT_VM_IMAGE),
  cores: z.number().int().positive().default(2),
  memory: z.number().int().positive().default(2048),
  disk_device: z.string().regex(/^(scsi|virtio|sata|ide)\d+$/).default("scsi0"),
  settle_delay_ms: z.number().int().min(0).default(30_000),
  exec_timeout_s: z.number().int().min(1).default(1800),
  mac_prefix: z.string().regex(/^([0-9A-F]{2}:){2}[0-9A-F]{2}$/).default("52:54:00"),
});

export const NetworkSettingsSchema = z.object({
  bridge: z.string().min(1).default("vmbr0"),
  interface: z.string().min(1).default("eth0"),
  gateway: Ipv4AddressSchema.default("192.168.0.1"),
  dns: Ipv4AddressSchema.default("1.1.1.1"),
});

export const GuestSettingsSchema = z.object({
  config_path: z.string().regex(ABSOLUTE_PATH).default("/etc/nixos/configuration.nix"),
  shell_path: z.string().regex(ABSOLUTE_PATH).default("/run/current-system/sw/bin"),
  activation_command: z.string().min(1).default("nixos-rebuild switch"),
  packages: z.array(z.string().regex(PACKAGE_PATTERN)).default(["nano", "wget", "htop", "binutils", "man"]),
  state_version: z.string().regex(/^\d{2}\.\d{2}$/).default("24.05"),
});

export const ProvisionerSettingsSchema = z.object({
  storage: z.string().min(1).default("local-btrfs"),
  hostname_prefix: HostnameSchema.default("node"),
  network: NetworkSettingsSchema.default({}),
  container: ContainerSettingsSchema.default({}),
  vm: VmSettingsSchema.default({}),
  guest: GuestSettingsSchema.default({}),
  logging: z.object({
    level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  }).default({}),
}).strict();

export const Ipv4CidrSchema = z.object({
  ip: Ipv4AddressSchema,
  prefix: z.number().int().min(1).max(32),
});

export const NodeSpecSchema = z.object({
  kind: NodeKindSchema,
  id: z.number().int().positive(),
  hostname: HostnameSchema,
  address: Ipv4CidrSchema,
  gateway: Ipv4AddressSchema,
  dns: Ipv4AddressSchema,
  sizing: z.object({
    cores: z.number().int().positive(),
    memoryMb: z.number().int().positive(),
    /** Container root disk; VMs keep the image disk, grown only by diskSize. */
    diskGb: z.number().int().positive().optional(),
  }),
  privileged: z.boolean(),
  diskSize: z.string().regex(DISK_SIZE_PATTERN, "must look like 32G or +8G").optional(),
});

export const BatchSpecSchema = z.object({
  kind: NodeKindSchema,
  baseId: z.number().int().positive(),
  count: z.number().int().min(1, "count must be at least 1"),
  baseAddress: z.string().min(1),
  gateway: Ipv4AddressSchema,
  privileged: z.boolean(),
});

export type NodeKind = z.infer<typeof NodeKindSchema>;
export type ProvisionerSettings = z.infer<typeof ProvisionerSettingsSchema>;
export type ContainerSettings = z.infer<typeof ContainerSettingsSchema>;
export type VmSettings = z.infer<typeof VmSettingsSchema>;
export type NetworkSettings = z.infer<typeof NetworkSettingsSchema>;
export type GuestSettings = z.infer<typeof GuestSettingsSchema>;
export type Ipv4Cidr = z.infer<typeof Ipv4CidrSchema>;
export type NodeSpec = Readonly<z.infer<typeof NodeSpecSchema>>;
export type BatchSpec = z.infer<typeof BatchSpecSchema>;

export const formatCidr = (address: Ipv4Cidr): string => `${address.ip}/${address.prefix}`;
