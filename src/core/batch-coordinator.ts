import { Logger } from "../logging/logger";
import { Hypervisor, observedState, ObservedState } from "../providers/hypervisor";
import { BatchSpec, NodeSpec, ProvisionerSettings } from "../types/schemas";
import { errorMessage } from "./errors";
import type { NodeOutcome } from "./lifecycle";
import { NodeOrchestrator } from "./orchestrator";
import { nodeIds, planBatch } from "./planner";

export interface DeployReport {
  succeeded: boolean;
  outcomes: NodeOutcome[];
  /** Planned nodes never attempted because an earlier node failed. */
  skipped: NodeSpec[];
}

export interface NodeStatusReport {
  id: number;
  state: ObservedState | "unknown";
  /** Output of `ip addr show` inside the guest. */
  addresses?: string;
  probe: "reachable" | "unreachable" | "skipped";
  error?: string;
}

export interface TeardownReport {
  id: number;
  result: "removed" | "absent" | "failed";
  error?: string;
}

/**
 * Runs the orchestrator over a planned batch, one node at a time, and owns
 * the batch-wide status and teardown sweeps.
 */
export class BatchCoordinator {
  private readonly orchestrator: NodeOrchestrator;

  constructor(
    private readonly hypervisor: Hypervisor,
    private readonly settings: ProvisionerSettings,
    private readonly logger: Logger,
    orchestrator?: NodeOrchestrator,
  ) {
    this.orchestrator = orchestrator ?? new NodeOrchestrator(hypervisor, settings, logger);
  }

  /**
   * Plan, then provision in ascending order. Planning errors propagate
   * before any node is touched; the first failed node stops the batch.
   */
  async deploy(batch: BatchSpec): Promise<DeployReport> {
    const plan = planBatch(batch, this.settings);
    this.logger.info(`Deploying a cluster of ${plan.length} ${batch.kind === "lxc" ? "containers" : "VMs"}...`);

    const outcomes: NodeOutcome[] = [];
    for (const [index, node] of plan.entries()) {
      const outcome = await this.orchestrator.provision(node);
      outcomes.push(outcome);
      if (outcome.status === "failed") {
        const skipped = plan.slice(index + 1);
        this.logger.error(
          `Cluster deployment aborted at node ${node.id} (${outcome.failedStep}); ${skipped.length} node(s) not attempted`
        );
        return { succeeded: false, outcomes, skipped };
      }
    }

    this.logger.info("Cluster deployment completed successfully.");
    return { succeeded: true, outcomes, skipped: [] };
  }

  /** Report state, addresses and gateway reachability per node. Never throws for a single node. */
  async status(baseId: number, count: number, gateway = this.settings.network.gateway): Promise<NodeStatusReport[]> {
    const ids = nodeIds(baseId, count);
    const nic = this.settings.network.interface;
    const shell = this.settings.guest.shell_path;
    this.logger.info(`Checking ${ids.length} node(s)...`);

    const reports: NodeStatusReport[] = [];
    for (const id of ids) {
      let state: ObservedState;
      try {
        state = observedState(await this.hypervisor.status(id));
      } catch (error) {
        this.logger.warn(`Status of node ${id}: query failed: ${errorMessage(error)}`);
        reports.push({ id, state: "unknown", probe: "skipped", error: errorMessage(error) });
        continue;
      }
      this.logger.info(`Status of node ${id}: ${state}`);
      if (state !== "running") {
        reports.push({ id, state, probe: "skipped" });
        continue;
      }

      const report: NodeStatusReport = { id, state, probe: "skipped" };
      try {
        report.addresses = await this.hypervisor.execInGuest(id, { argv: [`${shell}/ip`, "addr", "show", nic] });
      } catch (error) {
        report.error = errorMessage(error);
      }
      try {
        await this.hypervisor.execInGuest(id, { argv: [`${shell}/ping`, "-c", "1", "-W", "2", gateway] });
        report.probe = "reachable";
      } catch (error) {
        report.probe = "unreachable";
        this.logger.debug(`Node ${id} cannot reach ${gateway}: ${errorMessage(error)}`);
      }
      this.logger.info(`Node ${id} gateway ${gateway}: ${report.probe}`);
      reports.push(report);
    }
    return reports;
  }

  /** Stop and destroy every node in the range, continuing past failures. */
  async teardown(baseId: number, count: number): Promise<TeardownReport[]> {
    const ids = nodeIds(baseId, count);
    this.logger.info(`Cleaning up ${ids.length} node(s)...`);

    const reports: TeardownReport[] = [];
    for (const id of ids) {
      try {
        const status = await this.hypervisor.status(id);
        if (status.state === "absent") {
          this.logger.info(`Node ${id} does not exist, skipping`);
          reports.push({ id, result: "absent" });
          continue;
        }
      } catch (error) {
        this.logger.warn(`Status of node ${id} unknown (${errorMessage(error)}); removing anyway`);
      }

      this.logger.info(`Removing node ${id}...`);
      try {
        await this.hypervisor.stop(id);
      } catch (error) {
        this.logger.debug(`Stop of ${id} failed: ${errorMessage(error)}`);
      }
      try {
        await this.hypervisor.destroy(id);
        reports.push({ id, result: "removed" });
      } catch (error) {
        this.logger.error(`Failed to remove node ${id}: ${errorMessage(error)}`);
        reports.push({ id, result: "failed", error: errorMessage(error) });
      }
    }
    this.logger.info("Cleanup completed.");
    return reports;
  }
}
