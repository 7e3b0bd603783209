import { renderGuestConfig } from "../guest/nixos-config";
import { Logger } from "../logging/logger";
import {
  ContainerCreateRequest,
  generateMac,
  GuestCommand,
  Hypervisor,
  observedState,
  ObservedState,
  VmConfigureRequest,
} from "../providers/hypervisor";
import { formatCidr, NodeSpec, ProvisionerSettings } from "../types/schemas";
import {
  errorMessage,
  StartupTimeoutError,
  StepFailure,
  UnexpectedStateError,
  ValidationError,
} from "./errors";
import {
  InvalidTransitionError,
  isValidTransition,
  LifecycleState,
  NodeOutcome,
  StepDefinition,
  StepName,
  StepResult,
  stepsFor,
} from "./lifecycle";
import { pollUntil, sleep } from "./poll";

type StepAction = (node: NodeSpec) => Promise<void>;

/**
 * Drives one node from whatever the hypervisor currently holds to a running
 * guest with its NixOS configuration applied. Steps run strictly in order;
 * the first failure ends the node. Running it again on the same NodeSpec
 * converges to the same end state.
 */
export class NodeOrchestrator {
  private readonly actions: Record<StepName, StepAction>;
  /** NIC addresses handed to VMs in this run, reported once the node is up. */
  private readonly macAddresses = new Map<number, string>();

  constructor(
    private readonly hypervisor: Hypervisor,
    private readonly settings: ProvisionerSettings,
    private readonly logger: Logger,
  ) {
    this.actions = {
      "reconcile-absent": node => this.reconcileAbsent(node),
      create: node => this.create(node),
      start: node => this.start(node),
      "await-ready": node => this.awaitReady(node),
      settle: () => this.settle(),
      "inject-network": node => this.injectNetwork(node),
      "deliver-config": node => this.deliverConfig(node),
      activate: node => this.activate(node),
    };
  }

  private label(capitalized = false): string {
    if (this.hypervisor.kind === "vm") return "VM";
    return capitalized ? "Container" : "container";
  }

  async provision(node: NodeSpec): Promise<NodeOutcome> {
    if (node.kind !== this.hypervisor.kind) {
      throw new ValidationError(`Node ${node.id} is a ${node.kind} node but the hypervisor manages ${this.hypervisor.kind}`);
    }

    this.logger.info(`Creating ${this.label()} ${node.hostname} (ID: ${node.id})...`);
    this.logger.info(
      `Configuration: Cores=${node.sizing.cores}, Memory=${node.sizing.memoryMb} MB, ` +
      (node.kind === "lxc"
        ? `Disk=${node.sizing.diskGb} GB, Privileged=${node.privileged ? 1 : 0}`
        : `Disk=${node.diskSize ?? "image default"}`) +
      `, Address=${formatCidr(node.address)}`
    );

    this.macAddresses.delete(node.id);
    let state: LifecycleState = "pending";
    const completed: StepName[] = [];

    for (const step of stepsFor(node.kind)) {
      if (!isValidTransition(state, step.to)) {
        throw new InvalidTransitionError(state, step.to);
      }
      const result = await this.runStep(step, node);
      if (!result.ok) {
        this.logger.error(result.error.message, result.error, { node: node.id, step: step.name });
        return { status: "failed", node, state, failedStep: step.name, steps: completed, error: result.error };
      }
      state = result.state;
      completed.push(step.name);
      this.logger.debug(`Node ${node.id} reached ${state}`);
    }

    this.logger.info(`${this.label(true)} ${node.hostname} created and configured successfully.`);
    const mac = this.macAddresses.get(node.id);
    if (mac) {
      this.logger.info(`You can connect via: ssh root@${node.address.ip}`);
      this.logger.info(`MAC Address: ${mac}`);
    }
    return { status: "succeeded", node, state: "config-applied", steps: completed };
  }

  private async runStep(step: StepDefinition, node: NodeSpec): Promise<StepResult> {
    try {
      if (step.requires) {
        await this.expectState(node.id, step.requires);
      }
      await this.actions[step.name](node);
      return { ok: true, state: step.to };
    } catch (error) {
      if (error instanceof StartupTimeoutError) {
        return { ok: false, error };
      }
      return { ok: false, error: new StepFailure(step.name, node.id, error) };
    }
  }

  private async expectState(id: number, expected: ObservedState): Promise<void> {
    const observed = observedState(await this.hypervisor.status(id));
    if (observed !== expected) {
      throw new UnexpectedStateError(id, expected, observed);
    }
  }

  private async reconcileAbsent(node: NodeSpec): Promise<void> {
    const status = await this.hypervisor.status(node.id);
    if (status.state === "absent") {
      return;
    }

    this.logger.info(`${this.label(true)} ${node.id} already exists. Removing...`);
    if (status.running) {
      try {
        await this.hypervisor.stop(node.id);
      } catch (error) {
        // destroy below decides whether the resource can still be removed
        this.logger.warn(`Stop of ${node.id} failed: ${errorMessage(error)}`);
      }
    }
    await this.hypervisor.destroy(node.id);
  }

  private containerRequest(node: NodeSpec): ContainerCreateRequest {
    if (node.sizing.diskGb === undefined) {
      throw new ValidationError(`Container ${node.id} has no root disk size`);
    }
    return {
      id: node.id,
      hostname: node.hostname,
      cores: node.sizing.cores,
      memoryMb: node.sizing.memoryMb,
      diskGb: node.sizing.diskGb,
      address: formatCidr(node.address),
      gateway: node.gateway,
      dns: node.dns,
      bridge: this.settings.network.bridge,
      storage: this.settings.storage,
      privileged: node.privileged,
      template: this.settings.container.template,
    };
  }

  private vmRequest(node: NodeSpec, macAddress: string): VmConfigureRequest {
    return {
      id: node.id,
      hostname: node.hostname,
      cores: node.sizing.cores,
      memoryMb: node.sizing.memoryMb,
      address: formatCidr(node.address),
      gateway: node.gateway,
      dns: node.dns,
      bridge: this.settings.network.bridge,
      macAddress,
    };
  }

  private async create(node: NodeSpec): Promise<void> {
    if (node.kind === "lxc") {
      await this.hypervisor.create(this.containerRequest(node));
      return;
    }

    this.logger.info("Restoring from VMA...");
    await this.hypervisor.restoreFromImage(node.id, this.settings.vm.image, this.settings.storage);
    const mac = generateMac(this.settings.vm.mac_prefix);
    this.macAddresses.set(node.id, mac);
    this.logger.info("Configuring VM...");
    await this.hypervisor.configure(this.vmRequest(node, mac));
    if (node.diskSize) {
      this.logger.info(`Resizing ${this.settings.vm.disk_device} to ${node.diskSize}...`);
      await this.hypervisor.resizeDisk(node.id, this.settings.vm.disk_device, node.diskSize);
    }
  }

  private async start(node: NodeSpec): Promise<void> {
    this.logger.info(`Starting the ${this.label()}...`);
    await this.hypervisor.start(node.id);
  }

  private async awaitReady(node: NodeSpec): Promise<void> {
    const { interval_ms, max_attempts } = this.settings.container.readiness;
    this.logger.info("Waiting for container to be running...");
    const result = await pollUntil(
      async () => {
        const status = await this.hypervisor.status(node.id);
        return status.state === "exists" && status.running;
      },
      {
        intervalMs: interval_ms,
        maxAttempts: max_attempts,
        onRetry: (attempt, error) =>
          this.logger.debug(`Node ${node.id} not running yet (attempt ${attempt}/${max_attempts})${error ? `: ${errorMessage(error)}` : ""}`),
      },
    );
    if (!result.satisfied) {
      throw new StartupTimeoutError(node.id, result.attempts, interval_ms);
    }
  }

  private async settle(): Promise<void> {
    const delay = this.settings.vm.settle_delay_ms;
    this.logger.info(`Waiting ${delay}ms for the VM to boot...`);
    await sleep(delay);
  }

  private shell(command: string): GuestCommand {
    return { argv: [`${this.settings.guest.shell_path}/su`, "-c", command, "root"] };
  }

  private async injectNetwork(node: NodeSpec): Promise<void> {
    const nic = this.settings.network.interface;
    this.logger.info("Applying Network configuration...");
    const commands = [
      `ip link set ${nic} up`,
      `ip addr replace ${formatCidr(node.address)} dev ${nic}`,
      `ip route replace default via ${node.gateway}`,
      `echo 'nameserver ${node.dns}' > /etc/resolv.conf`,
    ];
    for (const command of commands) {
      await this.hypervisor.execInGuest(node.id, this.shell(command));
    }
  }

  private async deliverConfig(node: NodeSpec): Promise<void> {
    const { guest } = this.settings;
    this.logger.info("Creating NixOS configuration...");
    const payload = renderGuestConfig(node, guest, this.settings.network.interface);
    await this.hypervisor.execInGuest(node.id, {
      argv: [`${guest.shell_path}/tee`, guest.config_path],
      input: payload,
    });
  }

  private async activate(node: NodeSpec): Promise<void> {
    this.logger.info("Applying NixOS configuration...");
    await this.hypervisor.execInGuest(node.id, this.shell(this.settings.guest.activation_command));
  }
}
