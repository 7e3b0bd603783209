/**
 * Node lifecycle: states, steps and the transitions they are allowed to make.
 *
 * ```
 * pending → absent             reconcile-absent
 * absent  → created            create
 * created → started            start
 * started → ready              await-ready (lxc) | settle (vm)
 * ready   → networked          inject-network (lxc)
 * ready | networked → config-delivered    deliver-config
 * config-delivered  → config-applied      activate
 * ```
 *
 * Any failing step ends the node as `failed`; there is no way back from
 * `failed` inside one invocation. Recovery is a fresh invocation, which
 * starts again at `pending`.
 */

import type { NodeKind, NodeSpec } from "../types/schemas";
import type { ObservedState } from "../providers/hypervisor";
import type { NodeFailure } from "./errors";

export const LIFECYCLE_STATES = [
  "pending",
  "absent",
  "created",
  "started",
  "ready",
  "networked",
  "config-delivered",
  "config-applied",
] as const;

export type LifecycleState = (typeof LIFECYCLE_STATES)[number];

export type StepName =
  | "reconcile-absent"
  | "create"
  | "start"
  | "await-ready"
  | "settle"
  | "inject-network"
  | "deliver-config"
  | "activate";

export const VALID_TRANSITIONS: Record<LifecycleState, readonly LifecycleState[]> = {
  pending: ["absent"],
  absent: ["created"],
  created: ["started"],
  started: ["ready"],
  ready: ["networked", "config-delivered"],
  networked: ["config-delivered"],
  "config-delivered": ["config-applied"],
  "config-applied": [],
};

export function isValidTransition(from: LifecycleState, to: LifecycleState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export interface StepDefinition {
  name: StepName;
  to: LifecycleState;
  /** Hypervisor state that must be observed right before the step runs. */
  requires?: ObservedState;
}

export const CONTAINER_STEPS: readonly StepDefinition[] = [
  { name: "reconcile-absent", to: "absent" },
  { name: "create", to: "created", requires: "absent" },
  { name: "start", to: "started", requires: "stopped" },
  { name: "await-ready", to: "ready" },
  { name: "inject-network", to: "networked", requires: "running" },
  { name: "deliver-config", to: "config-delivered", requires: "running" },
  { name: "activate", to: "config-applied", requires: "running" },
];

// VMs take their network from cloud-init and have no readiness query to poll
export const VM_STEPS: readonly StepDefinition[] = [
  { name: "reconcile-absent", to: "absent" },
  { name: "create", to: "created", requires: "absent" },
  { name: "start", to: "started", requires: "stopped" },
  { name: "settle", to: "ready" },
  { name: "deliver-config", to: "config-delivered", requires: "running" },
  { name: "activate", to: "config-applied", requires: "running" },
];

export function stepsFor(kind: NodeKind): readonly StepDefinition[] {
  return kind === "lxc" ? CONTAINER_STEPS : VM_STEPS;
}

export type StepResult =
  | { ok: true; state: LifecycleState }
  | { ok: false; error: NodeFailure };

export type NodeOutcome =
  | {
      status: "succeeded";
      node: NodeSpec;
      state: "config-applied";
      steps: StepName[];
    }
  | {
      status: "failed";
      node: NodeSpec;
      /** Last state reached before the failing step. */
      state: LifecycleState;
      failedStep: StepName;
      steps: StepName[];
      error: NodeFailure;
    };

/** Thrown when a step table asks for a transition outside the graph. */
export class InvalidTransitionError extends Error {
  readonly name = "InvalidTransitionError" as const;
  constructor(from: LifecycleState, to: LifecycleState) {
    super(`Invalid lifecycle transition: ${from} → ${to}`);
  }
}
