import type { StageError, StageLogEntry } from "@pavewise/contracts";

import {
  ConfigurationError,
  StageTimeoutError,
  WorkflowCancelledError,
  WorkflowLoopError,
  errorMessage,
} from "./errors";

export const END = "__end__";
export type End = typeof END;

export type StagePolicy = "continue" | "fatal";

export type StageName<TResults> = Extract<keyof TResults, string>;

/**
 * The single mutable object threaded through one run. Stage outputs are keyed by
 * stage name; the log holds one entry per stage visit, in visit order.
 */
export interface WorkflowState<TInput, TResults> {
  input: TInput;
  results: Partial<TResults>;
  log: StageLogEntry[];
  fatal: boolean;
  degraded: boolean;
  cancelled: boolean;
}

export interface StageContext {
  stage: string;
  signal: AbortSignal;
  now: () => number;
}

export interface StageDefinition<TInput, TResults, K extends StageName<TResults>> {
  policy: StagePolicy;
  timeoutMs?: number;
  run: (state: WorkflowState<TInput, TResults>, context: StageContext) => Promise<TResults[K]>;
}

export type Router<TInput, TResults> = (state: WorkflowState<TInput, TResults>) => StageName<TResults> | End;

export type Edge<TInput, TResults> = StageName<TResults> | End | Router<TInput, TResults>;

export interface WorkflowGraph<TInput, TResults> {
  name: string;
  stages: { [K in StageName<TResults>]: StageDefinition<TInput, TResults, K> };
  edges: { [K in StageName<TResults>]: Edge<TInput, TResults> };
}

export type WorkflowEvent = {
  type: "stage_started" | "stage_succeeded" | "stage_failed";
  workflow: string;
  stage: string;
  at: number;
  durationMs?: number;
  errorName?: string;
  message?: string;
};

export interface WorkflowEngineOptions {
  maxSteps?: number;
  defaultTimeoutMs?: number;
  now?: () => number;
  onEvent?: (event: WorkflowEvent) => void;
}

export type WorkflowRunOptions = {
  signal?: AbortSignal;
};

export const createWorkflowState = <TInput, TResults>(input: TInput): WorkflowState<TInput, TResults> => ({
  input,
  results: {},
  log: [],
  fatal: false,
  degraded: false,
  cancelled: false,
});

export const collectStageErrors = (log: ReadonlyArray<StageLogEntry>): StageError[] =>
  log
    .filter((entry) => entry.status === "failed")
    .map((entry) => ({ stage: entry.stage, message: entry.message ?? "Unknown failure" }));

export class WorkflowEngine {
  private readonly maxSteps: number;
  private readonly defaultTimeoutMs: number;
  private readonly now: () => number;
  private readonly onEvent?: (event: WorkflowEvent) => void;

  constructor(options: WorkflowEngineOptions = {}) {
    this.maxSteps = options.maxSteps ?? 25;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 30_000;
    this.now = options.now ?? Date.now;
    this.onEvent = options.onEvent;

    if (!Number.isInteger(this.maxSteps) || this.maxSteps < 1) {
      throw new ConfigurationError(`maxSteps must be a positive integer, received ${this.maxSteps}`);
    }
  }

  async run<TInput, TResults>(
    graph: WorkflowGraph<TInput, TResults>,
    entry: StageName<TResults>,
    state: WorkflowState<TInput, TResults>,
    options: WorkflowRunOptions = {},
  ): Promise<WorkflowState<TInput, TResults>> {
    this.assertGraph(graph, entry);

    const visited: string[] = [];
    let current: StageName<TResults> | End = entry;

    while (current !== END) {
      if (visited.length >= this.maxSteps) {
        throw new WorkflowLoopError({ maxSteps: this.maxSteps, visited });
      }
      if (!this.hasStage(graph, current)) {
        throw new ConfigurationError(`Workflow ${graph.name} routed to unknown stage: ${current}`);
      }

      visited.push(current);
      const completed = await this.visit(graph, current, state, options.signal);
      if (!completed) {
        break;
      }

      current = this.resolveNext(graph, current, state);
    }

    return state;
  }

  // Returns false when the run must stop (fatal policy or cancellation).
  private async visit<TInput, TResults, K extends StageName<TResults>>(
    graph: WorkflowGraph<TInput, TResults>,
    name: K,
    state: WorkflowState<TInput, TResults>,
    signal: AbortSignal | undefined,
  ): Promise<boolean> {
    const stage = graph.stages[name];
    const startedAt = this.now();
    const entry: StageLogEntry = { stage: name, status: "running", startedAt };
    state.log.push(entry);
    this.emit({ type: "stage_started", workflow: graph.name, stage: name, at: startedAt });

    try {
      const output = await this.invoke(name, stage.timeoutMs ?? this.defaultTimeoutMs, signal, (stageSignal) =>
        stage.run(state, { stage: name, signal: stageSignal, now: this.now }),
      );
      state.results[name] = output;

      entry.status = "succeeded";
      entry.finishedAt = this.now();
      this.emit({
        type: "stage_succeeded",
        workflow: graph.name,
        stage: name,
        at: entry.finishedAt,
        durationMs: entry.finishedAt - startedAt,
      });
      return true;
    } catch (error) {
      entry.status = "failed";
      entry.finishedAt = this.now();
      entry.errorName = error instanceof Error ? error.name : "Error";
      entry.message = errorMessage(error);
      this.emit({
        type: "stage_failed",
        workflow: graph.name,
        stage: name,
        at: entry.finishedAt,
        durationMs: entry.finishedAt - startedAt,
        errorName: entry.errorName,
        message: entry.message,
      });

      if (error instanceof WorkflowCancelledError) {
        state.cancelled = true;
        state.fatal = true;
        return false;
      }
      if (stage.policy === "fatal") {
        state.fatal = true;
        return false;
      }

      state.degraded = true;
      return true;
    }
  }

  private async invoke<T>(
    stage: string,
    timeoutMs: number,
    parentSignal: AbortSignal | undefined,
    task: (signal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    if (parentSignal?.aborted) {
      throw new WorkflowCancelledError({ stage });
    }

    const controller = new AbortController();
    let interrupt: (error: Error) => void = () => undefined;
    const interrupted = new Promise<never>((_, reject) => {
      interrupt = reject;
    });

    // Interrupt before aborting so a stage that settles on abort cannot win the race.
    const onAbort = (): void => {
      interrupt(new WorkflowCancelledError({ stage }));
      controller.abort();
    };
    const timer = setTimeout(() => {
      interrupt(new StageTimeoutError({ stage, timeoutMs }));
      controller.abort();
    }, timeoutMs);
    parentSignal?.addEventListener("abort", onAbort, { once: true });

    try {
      return await Promise.race([task(controller.signal), interrupted]);
    } finally {
      clearTimeout(timer);
      parentSignal?.removeEventListener("abort", onAbort);
    }
  }

  private resolveNext<TInput, TResults>(
    graph: WorkflowGraph<TInput, TResults>,
    current: StageName<TResults>,
    state: WorkflowState<TInput, TResults>,
  ): StageName<TResults> | End {
    const edge: Edge<TInput, TResults> = graph.edges[current];
    return typeof edge === "function" ? edge(state) : edge;
  }

  private assertGraph<TInput, TResults>(graph: WorkflowGraph<TInput, TResults>, entry: string): void {
    if (!this.hasStage(graph, entry)) {
      throw new ConfigurationError(`Workflow ${graph.name} has no entry stage named ${entry}`);
    }

    for (const [from, edge] of Object.entries(graph.edges)) {
      if (typeof edge === "string" && edge !== END && !this.hasStage(graph, edge)) {
        throw new ConfigurationError(`Workflow ${graph.name} has an edge from ${from} to unknown stage ${edge}`);
      }
    }
  }

  private hasStage<TInput, TResults>(graph: WorkflowGraph<TInput, TResults>, name: string): name is StageName<TResults> {
    return Object.prototype.hasOwnProperty.call(graph.stages, name);
  }

  private emit(event: WorkflowEvent): void {
    this.onEvent?.(event);
  }
}
