/**
 * RunCoordinatorService — executes a stack plan (tiers, retries, cascade)
 *
 * Tiers run strictly in order with a barrier between them. Inside a tier
 * agents run concurrently when `parallel_init` is set, otherwise one by
 * one in declaration order. The coordinator is the only writer of
 * RunState; every status change goes through RunStateService so an agent
 * can never be started twice in the same pass.
 */

import { setTimeout as delay } from "node:timers/promises";
import { DEFAULT_RUNNER_CONFIG, isAgentResult } from "../types/index.js";
import type {
  AgentImplementation,
  AgentInvocationContext,
  AgentReport,
  AgentSpec,
  DirtySet,
  ExecutionPlan,
  FailureBoundary,
  RunFailure,
  RunReport,
  RunState,
  RunnerConfig,
  StackEvent,
  StackGraph,
} from "../types/index.js";
import { ExecutionError } from "../errors/index.js";
import { parseSourceRef } from "./GraphBuilderService.js";
import { computeExecutionPlan } from "./ExecutionPlannerService.js";
import { computeDirtySet, computeExternalDirtySet } from "./PropagationService.js";
import {
  createRunState,
  markDirty,
  reconcileRunState,
  transitionAgent,
  updateAgent,
} from "./RunStateService.js";
import { NULL_EVENT_LOG } from "./EventLogService.js";
import type { EventLogLike } from "./EventLogService.js";
import type { ImplementationResolverLike } from "./ImplementationResolver.js";

// ── Minimal structural interface for the output channel ──────────

/** Line-oriented logger; the CLI backs it with stderr. */
export interface OutputChannelLike {
  appendLine(value: string): void;
}

export interface RunCoordinatorOptions {
  config?: RunnerConfig;
  eventLog?: EventLogLike;
  outputChannel?: OutputChannelLike;
  /** Values for `external:<id>` inputs, keyed by id. */
  externals?: Record<string, unknown>;
  /** Persisted state from an earlier process; reconciled against the graph. */
  initialState?: RunState;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

/**
 * Delay before retry number `attempt` (1-based):
 * `backoff_base_ms * 2^(attempt - 1)`, capped at `backoff_max_ms`.
 */
export function computeBackoffDelay(attempt: number, config: RunnerConfig): number {
  return Math.min(
    config.backoff_base_ms * 2 ** (attempt - 1),
    config.backoff_max_ms,
  );
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Bookkeeping for one pass over the plan. */
interface PassContext {
  scheduled: Set<string>;
  started: Set<string>;
  skipped: Set<string>;
  reports: Map<string, AgentReport>;
  failures: RunFailure[];
  boundaries: FailureBoundary[];
}

export class RunCoordinator {
  private graph: StackGraph;
  private plan: ExecutionPlan;
  private state: RunState;
  private externals: Record<string, unknown>;
  private running = false;

  private readonly resolver: ImplementationResolverLike;
  private readonly config: RunnerConfig;
  private readonly eventLog: EventLogLike;
  private readonly outputChannel: OutputChannelLike;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(
    graph: StackGraph,
    resolver: ImplementationResolverLike,
    options: RunCoordinatorOptions = {},
  ) {
    this.graph = graph;
    this.resolver = resolver;
    this.config = options.config ?? DEFAULT_RUNNER_CONFIG;
    this.eventLog = options.eventLog ?? NULL_EVENT_LOG;
    this.outputChannel = options.outputChannel ?? { appendLine: () => {} };
    this.externals = { ...(options.externals ?? {}) };
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.now = options.now ?? (() => new Date());

    this.plan = computeExecutionPlan(graph);
    this.state = options.initialState
      ? reconcileRunState(options.initialState, graph, this.plan).state
      : createRunState(graph, this.plan);
  }

  // ── Read-only accessors ──────────────────────────────────────────

  getPlan(): ExecutionPlan {
    return this.plan;
  }

  getGraph(): StackGraph {
    return this.graph;
  }

  getRunState(): RunState {
    return this.state;
  }

  // ── Change propagation ───────────────────────────────────────────

  /**
   * Record that the outputs of `agents` changed outside a run and queue
   * their dirty set for the next `run()`.
   */
  async markChanged(agents: readonly string[]): Promise<DirtySet> {
    const dirty = computeDirtySet(this.graph, this.plan, agents);
    await this.applyDirtySet(dirty, { cause: "agents", changed: [...dirty.frontier] });
    return dirty;
  }

  /**
   * Replace the values of external sources and queue every agent that
   * reads them, plus their downstream, for the next `run()`.
   */
  async refeedExternal(values: Record<string, unknown>): Promise<DirtySet> {
    const dirty = computeExternalDirtySet(this.graph, this.plan, Object.keys(values));
    this.externals = { ...this.externals, ...values };
    await this.applyDirtySet(dirty, { cause: "external", changed: [...dirty.frontier] });
    return dirty;
  }

  /**
   * Re-queue every failed agent (including ones failed by cascade_stop)
   * so the next `run()` tries them again. Returns the re-queued agents.
   */
  async requeueFailed(): Promise<string[]> {
    const failed = this.plan.tiers
      .flat()
      .filter((name) => this.state.agents[name]?.status === "failed");
    await this.applyDirtySet(
      { frontier: failed, dirty: failed, tiers: [failed] },
      { cause: "requeue" },
    );
    return failed;
  }

  private async applyDirtySet(
    dirty: DirtySet,
    detail: Record<string, unknown>,
  ): Promise<void> {
    const { state, marked } = markDirty(this.state, dirty.dirty);
    this.state = state;
    for (const agent of marked) {
      await this.log({ event: "agent_stale", agent, detail });
    }
  }

  // ── Plan reconciliation ──────────────────────────────────────────

  /**
   * Adopt a new graph: recompute the plan and reconcile RunState against
   * it. Agents whose declaration changed, and their dependents, re-run on
   * the next pass.
   */
  async reconcile(graph: StackGraph): Promise<ExecutionPlan> {
    if (this.running) {
      throw new Error("RunCoordinator: cannot reconcile while a run is in progress");
    }

    const plan = computeExecutionPlan(graph);
    const result = reconcileRunState(this.state, graph, plan);
    const previousVersion = this.plan.version;

    this.graph = graph;
    this.plan = plan;
    this.state = result.state;

    await this.log({
      event: "plan_reconciled",
      detail: {
        previous_version: previousVersion,
        plan_version: plan.version,
        added: result.added,
        removed: result.removed,
        changed: result.changed,
        invalidated: result.invalidated,
      },
    });
    this.outputChannel.appendLine(
      `[RunCoordinator] plan ${previousVersion} -> ${plan.version}: ` +
        `${result.invalidated.length} agent(s) to re-run`,
    );
    return plan;
  }

  // ── Execution ────────────────────────────────────────────────────

  /**
   * Execute every pending or stale agent in plan order.
   *
   * Execution errors never reject: they are recorded in the report.
   * Agents left failed by an earlier pass are listed in `failures` and
   * make the outcome `failed` until they are re-queued.
   */
  async run(): Promise<RunReport> {
    if (this.running) {
      throw new Error("RunCoordinator: a run is already in progress");
    }
    this.running = true;
    try {
      return await this.executePass();
    } finally {
      this.running = false;
    }
  }

  private async executePass(): Promise<RunReport> {
    const startedAt = this.now().toISOString();
    const pass: PassContext = {
      scheduled: new Set(
        this.plan.tiers
          .flat()
          .filter((name) => {
            const status = this.state.agents[name]?.status;
            return status === "pending" || status === "stale";
          }),
      ),
      started: new Set(),
      skipped: new Set(),
      reports: new Map(),
      failures: [],
      boundaries: [],
    };

    await this.log({
      event: "run_started",
      detail: { plan_version: this.plan.version, scheduled: [...pass.scheduled] },
    });

    // Failures left over from an earlier pass still block their dependents.
    for (const name of this.plan.tiers.flat()) {
      if (this.state.agents[name]?.status === "failed") {
        await this.skipDownstream(name, pass);
      }
    }

    for (const tier of this.plan.tiers) {
      const ready = tier.filter(
        (name) => pass.scheduled.has(name) && !pass.skipped.has(name),
      );
      if (ready.length === 0) continue;

      if (this.graph.policies.parallel_init) {
        await Promise.all(ready.map((name) => this.executeAgent(name, pass)));
      } else {
        for (const name of ready) {
          await this.executeAgent(name, pass);
        }
      }
    }

    // An agent still failed from an earlier pass keeps the run failed.
    for (const name of this.plan.tiers.flat()) {
      const agentState = this.state.agents[name];
      if (agentState?.status === "failed" && !pass.reports.has(name)) {
        pass.failures.push({
          agent: name,
          message: agentState.error ?? `agent ${name} failed in an earlier pass`,
          attempts: agentState.attempts,
          timed_out: false,
        });
      }
    }

    const agents: AgentReport[] = [];
    for (const name of this.plan.tiers.flat()) {
      const report = pass.reports.get(name);
      if (report !== undefined) agents.push(report);
    }

    const outcome =
      pass.failures.length === 0 && pass.skipped.size === 0 ? "succeeded" : "failed";
    const report: RunReport = {
      stack: this.graph.name,
      plan_version: this.plan.version,
      started_at: startedAt,
      finished_at: this.now().toISOString(),
      outcome,
      agents,
      failures: pass.failures,
      failure_boundaries: pass.boundaries,
    };

    await this.log({
      event: "run_finished",
      detail: { outcome, failed: pass.failures.map((f) => f.agent) },
    });
    return report;
  }

  private specFor(name: string): AgentSpec {
    const index = this.graph.indexOf.get(name);
    if (index === undefined) {
      throw new Error(`RunCoordinator: agent ${name} is not part of the graph`);
    }
    return this.graph.agents[index];
  }

  private async executeAgent(name: string, pass: PassContext): Promise<void> {
    const spec = this.specFor(name);
    const startedMs = this.now().getTime();
    pass.started.add(name);

    this.state = transitionAgent(this.state, name, "running", {
      attempts: 0,
      last_run_timestamp: this.now().toISOString(),
    });
    await this.log({ event: "agent_started", agent: name });

    let inputs: Record<string, unknown>;
    try {
      inputs = this.collectInputs(spec);
    } catch (err) {
      const failure =
        err instanceof ExecutionError
          ? err
          : new ExecutionError(name, errorMessage(err), { attempts: 0, cause: err });
      await this.failAgent(name, failure, 0, startedMs, pass);
      return;
    }

    const maxAttempts = this.graph.policies.auto_restart ? this.config.max_attempts : 1;
    let lastError: ExecutionError | null = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      this.state = updateAgent(this.state, name, { attempts: attempt });
      try {
        const outputs = await this.invokeOnce(spec, inputs, attempt);
        this.state = transitionAgent(this.state, name, "succeeded", {
          last_output_value: outputs,
          error: null,
        });
        pass.reports.set(name, {
          agent: name,
          status: "succeeded",
          attempts: attempt,
          skipped: false,
          error: null,
          duration_ms: this.now().getTime() - startedMs,
        });
        await this.log({ event: "agent_succeeded", agent: name, attempt });
        return;
      } catch (err) {
        lastError =
          err instanceof ExecutionError
            ? err
            : new ExecutionError(name, errorMessage(err), { attempts: attempt, cause: err });

        if (attempt < maxAttempts) {
          const wait = computeBackoffDelay(attempt, this.config);
          this.outputChannel.appendLine(
            `[RunCoordinator] ${name} failed (attempt ${attempt}/${maxAttempts}): ` +
              `${lastError.message}; retrying in ${wait}ms`,
          );
          await this.log({
            event: "agent_retry",
            agent: name,
            attempt,
            detail: { error: lastError.message, delay_ms: wait },
          });
          await this.sleep(wait);
        }
      }
    }

    const terminal =
      lastError ?? new ExecutionError(name, "no attempt was made", { attempts: 0 });
    await this.failAgent(name, terminal, maxAttempts, startedMs, pass);
  }

  private async failAgent(
    name: string,
    error: ExecutionError,
    attempts: number,
    startedMs: number,
    pass: PassContext,
  ): Promise<void> {
    this.state = transitionAgent(this.state, name, "failed", {
      attempts,
      error: error.message,
    });
    pass.failures.push({
      agent: name,
      message: error.message,
      attempts,
      timed_out: error.timedOut,
    });
    pass.reports.set(name, {
      agent: name,
      status: "failed",
      attempts,
      skipped: false,
      error: error.message,
      duration_ms: this.now().getTime() - startedMs,
    });
    this.outputChannel.appendLine(`[RunCoordinator] ${error.message}`);
    await this.log({
      event: "agent_failed",
      agent: name,
      detail: { error: error.message, attempts, timed_out: error.timedOut },
    });

    await this.skipDownstream(name, pass);
  }

  /**
   * Skip every scheduled, not-yet-started dependent of a failed agent.
   * With cascade_stop they are failed outright; otherwise they keep their
   * status and wait for the next pass.
   */
  private async skipDownstream(failed: string, pass: PassContext): Promise<void> {
    const { dirty } = computeDirtySet(this.graph, this.plan, [failed]);
    const cascade = this.graph.policies.cascade_stop;
    const skipped: string[] = [];

    for (const name of dirty) {
      if (!pass.scheduled.has(name) || pass.started.has(name) || pass.skipped.has(name)) {
        continue;
      }
      pass.skipped.add(name);
      skipped.push(name);

      const reason = `skipped: upstream agent ${failed} failed`;
      if (cascade) {
        this.state = transitionAgent(this.state, name, "failed", { attempts: 0, error: reason });
      }
      pass.reports.set(name, {
        agent: name,
        status: this.state.agents[name].status,
        attempts: 0,
        skipped: true,
        error: reason,
        duration_ms: 0,
      });
      await this.log({
        event: "agent_skipped",
        agent: name,
        detail: { upstream: failed, cascade_stop: cascade },
      });
    }

    if (skipped.length > 0) {
      pass.boundaries.push({ failed, skipped });
      this.outputChannel.appendLine(
        `[RunCoordinator] ${failed} failed; skipping ${skipped.join(", ")}`,
      );
    }
  }

  /**
   * Build the input mapping for an agent from upstream outputs and
   * external values.
   *
   * @throws ExecutionError — an external value or upstream output is missing
   */
  private collectInputs(spec: AgentSpec): Record<string, unknown> {
    const inputs: Record<string, unknown> = {};

    for (const input of spec.inputs) {
      const ref = parseSourceRef(input.source);
      if (ref === null) {
        throw new ExecutionError(spec.name, `input ${input.name} has malformed source "${input.source}"`, {
          attempts: 0,
        });
      }

      if (ref.kind === "external") {
        if (!Object.hasOwn(this.externals, ref.id)) {
          throw new ExecutionError(
            spec.name,
            `external source "${input.source}" for input ${input.name} was not provided`,
            { attempts: 0 },
          );
        }
        inputs[input.name] = this.externals[ref.id];
        continue;
      }

      const produced = this.state.agents[ref.agent]?.last_output_value ?? null;
      if (produced === null || !Object.hasOwn(produced, ref.output)) {
        throw new ExecutionError(
          spec.name,
          `upstream output ${input.source} for input ${input.name} is not available`,
          { attempts: 0 },
        );
      }
      inputs[input.name] = produced[ref.output];
    }

    return inputs;
  }

  /**
   * One invocation under the agent's time budget.
   *
   * Resolves with the declared outputs; every failure mode rejects with
   * an ExecutionError.
   */
  private async invokeOnce(
    spec: AgentSpec,
    inputs: Record<string, unknown>,
    attempt: number,
  ): Promise<Record<string, unknown>> {
    const name = spec.name;

    let implementation: AgentImplementation;
    try {
      implementation = await this.resolver.resolve(spec);
    } catch (err) {
      throw new ExecutionError(name, `cannot load implementation: ${errorMessage(err)}`, {
        attempts: attempt,
        cause: err,
      });
    }

    const timeoutMs = spec.timeout_ms ?? this.config.agent_timeout_ms;
    const controller = new AbortController();
    const context: AgentInvocationContext = { agent: name, attempt, signal: controller.signal };

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(
          new ExecutionError(name, `timed out after ${timeoutMs}ms`, {
            attempts: attempt,
            timedOut: true,
          }),
        );
      }, timeoutMs);
    });

    let result: unknown;
    try {
      result = await Promise.race([
        Promise.resolve().then(() => implementation(inputs, context)),
        timeout,
      ]);
    } catch (err) {
      if (err instanceof ExecutionError) throw err;
      throw new ExecutionError(name, `implementation threw: ${errorMessage(err)}`, {
        attempts: attempt,
        cause: err,
      });
    } finally {
      clearTimeout(timer);
    }

    if (!isAgentResult(result)) {
      throw new ExecutionError(name, "implementation returned a value that is not an agent result", {
        attempts: attempt,
      });
    }
    if (!result.ok) {
      throw new ExecutionError(name, result.error, { attempts: attempt });
    }

    const outputs: Record<string, unknown> = {};
    const missing: string[] = [];
    for (const output of spec.outputs) {
      if (Object.hasOwn(result.outputs, output.name)) {
        outputs[output.name] = result.outputs[output.name];
      } else {
        missing.push(output.name);
      }
    }
    if (missing.length > 0) {
      throw new ExecutionError(name, `missing declared outputs: ${missing.join(", ")}`, {
        attempts: attempt,
      });
    }
    return outputs;
  }

  // ── Event log ────────────────────────────────────────────────────

  private async log(event: Omit<StackEvent, "timestamp" | "stack">): Promise<void> {
    await this.eventLog.append({
      timestamp: this.now().toISOString(),
      stack: this.graph.name,
      ...event,
    });
  }
}
