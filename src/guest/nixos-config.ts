import { GuestSettings, NodeSpec } from "../types/schemas";

// systemd units that cannot start inside an unprivileged LXC guest
const LXC_SUPPRESSED_UNITS = [
  "dev-mqueue.mount",
  "sys-kernel-debug.mount",
  "sys-fs-fuse-connections.mount",
];

const indent = (lines: string[], depth: number): string =>
  lines.map(line => (line ? `${" ".repeat(depth)}${line}` : line)).join("\n");

function platformBlock(node: NodeSpec): string[] {
  if (node.kind === "lxc") {
    return [
      "imports = [",
      '  "${modulesPath}/virtualisation/lxc-container.nix"',
      "];",
      "",
      "boot.isContainer = true;",
      "",
      "systemd.suppressedSystemUnits = [",
      ...LXC_SUPPRESSED_UNITS.map(unit => `  "${unit}"`),
      "];",
    ];
  }
  // proxmox-image.nix brings the root filesystem, boot loader and QEMU guest profile
  return [
    "imports = [",
    '  "${modulesPath}/virtualisation/proxmox-image.nix"',
    "];",
    "",
    "proxmox = {",
    "  qemuConf = {",
    `    cores = ${node.sizing.cores};`,
    `    memory = ${node.sizing.memoryMb};`,
    '    scsihw = "virtio-scsi-single";',
    "  };",
    "  cloudInit.enable = true;",
    "};",
    "",
    "services.qemuGuest.enable = true;",
    "",
    "services.cloud-init = {",
    "  enable = true;",
    "  network.enable = true;",
    "};",
    "",
    "users.users.nixos = {",
    "  isNormalUser = true;",
    '  description = "nixos";',
    '  initialPassword = "nixos";',
    '  extraGroups = [ "networkmanager" "wheel" ];',
    "};",
  ];
}

// Containers get a static address here; VMs take theirs from cloud-init (ipconfig0)
function networkingBlock(node: NodeSpec, interfaceName: string): string[] {
  const common = [
    `  hostName = "${node.hostname}";`,
    "  dhcpcd.enable = false;",
    "  enableIPv6 = false;",
    "  useHostResolvConf = false;",
  ];
  if (node.kind === "vm") {
    return ["networking = {", ...common, "};"];
  }
  return [
    "networking = {",
    ...common,
    `  nameservers = [ "${node.dns}" ];`,
    `  defaultGateway = "${node.gateway}";`,
    `  interfaces.${interfaceName} = {`,
    "    useDHCP = false;",
    "    ipv4.addresses = [",
    "      {",
    `        address = "${node.address.ip}";`,
    `        prefixLength = ${node.address.prefix};`,
    "      }",
    "    ];",
    "  };",
    "};",
  ];
}

/**
 * Render the NixOS configuration.nix for one node.
 * Pure: the same NodeSpec and settings always give the same bytes.
 */
export function renderGuestConfig(node: NodeSpec, guest: GuestSettings, interfaceName = "eth0"): string {
  const body = [
    ...platformBlock(node),
    "",
    "swapDevices = [];",
    "",
    ...networkingBlock(node, interfaceName),
    "",
    "services.openssh = {",
    "  enable = true;",
    "  settings = {",
    "    PasswordAuthentication = true;",
    '    PermitRootLogin = "yes";',
    "  };",
    "};",
    "",
    "environment.systemPackages = with pkgs; [",
    ...guest.packages.map(pkg => `  ${pkg}`),
    "];",
    "",
    `system.stateVersion = "${guest.state_version}";`,
  ];

  return [
    "{ modulesPath, config, pkgs, ... }:",
    "",
    "{",
    indent(body, 2),
    "}",
    "",
  ].join("\n");
}
