/** A single mutation against the target or host. Dry-run describes these instead of performing them. */
export type Action =
  | { readonly kind: "target-write"; readonly path: string; readonly content: string | Buffer; readonly mode: number }
  | { readonly kind: "target-remove"; readonly path: string }
  | { readonly kind: "target-run"; readonly description: string; readonly script: string; readonly bestEffort?: boolean }
  | { readonly kind: "host-write"; readonly path: string; readonly content: string | Buffer }
  | { readonly kind: "host-remove"; readonly path: string }
  | { readonly kind: "host-run"; readonly description: string; readonly script: string; readonly bestEffort?: boolean };

export type ActionStatus = "done" | "planned" | "tolerated" | "failed";

export interface ActionOutcome {
  readonly description: string;
  readonly status: ActionStatus;
  readonly exitCode?: number;
  readonly detail?: string;
}

export type StepStatus = "succeeded" | "failed" | "skipped" | "planned";

export interface StepOutcome {
  readonly step: string;
  readonly status: StepStatus;
  readonly actions: readonly ActionOutcome[];
  readonly error?: string;
}
