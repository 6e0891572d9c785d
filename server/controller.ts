import { setImmediate as nextTurn } from "node:timers/promises";
import { log } from "./log";
import { parseThetaRho } from "./pattern";
import { interpolatePath } from "./interpolate";
import { toBatches } from "./batch";
import type { ProtocolDriver } from "./protocol";
import type { IPatternStorage } from "./storage";
import {
  ExecutionBusyError,
  HandshakeAbortedError,
  InternalRunError,
  InvalidCommandError,
  MotionError,
  describeError,
} from "./errors";
import { commandNameSchema } from "@shared/schema";
import {
  ExecutionState,
  type ExecutionStatus,
  type MessageCallback,
  type RunStatus,
  type StateCallback,
} from "@shared/types";

export interface ExecutionOptions {
  /** Interpolation step for whole runs; passed explicitly, never the segment default. */
  stepSize: number;
  batchSize: number;
}

export type RunOutcome =
  | { status: Exclude<RunStatus, "failed">; batchesSent: number; pointsSent: number }
  | { status: "failed"; error: MotionError; batchesSent: number; pointsSent: number };

export interface RunHandle {
  id: number;
  pattern: string;
  /** Settles when the run ends; failures resolve as a `failed` outcome. */
  completion: Promise<RunOutcome>;
}

interface ActiveRun {
  id: number;
  pattern: string;
  abort: AbortController;
  batchesSent: number;
  totalBatches: number;
  pointsSent: number;
}

type Slot = { kind: "run"; run: ActiveRun } | { kind: "command"; command: string } | null;

export class ExecutionController {
  private state: ExecutionState = ExecutionState.IDLE;
  private slot: Slot = null;
  private lastRun: ActiveRun | null = null;
  private nextRunId = 1;
  private stateCallback: StateCallback | null = null;

  constructor(
    private readonly driver: ProtocolDriver,
    private readonly patterns: IPatternStorage,
    private readonly options: ExecutionOptions
  ) {}

  /**
   * Start running a pattern in the background.
   * Resolves as soon as the pattern has been read; the returned handle's
   * `completion` settles when the run ends.
   */
  public async run(patternName: string): Promise<RunHandle> {
    this.assertAvailable();

    const run: ActiveRun = {
      id: this.nextRunId++,
      pattern: patternName,
      abort: new AbortController(),
      batchesSent: 0,
      totalBatches: 0,
      pointsSent: 0,
    };
    this.slot = { kind: "run", run };

    let lines: string[];
    try {
      lines = await this.patterns.readPatternLines(patternName);
    } catch (error) {
      this.slot = null;
      throw error;
    }

    this.lastRun = run;
    this.transition(ExecutionState.RUNNING);
    log(`Run ${run.id} started: ${patternName}`, "runner");

    return { id: run.id, pattern: patternName, completion: this.execute(run, lines) };
  }

  /**
   * Request cancellation of the active run. Takes effect before the next
   * batch, or immediately if the run is waiting for READY.
   */
  public stop(): boolean {
    const slot = this.slot;
    if (slot?.kind !== "run") {
      return false;
    }
    log(`Stop requested for run ${slot.run.id}`, "runner");
    slot.run.abort.abort();
    return true;
  }

  public async sendCommand(name: string): Promise<void> {
    const parsed = commandNameSchema.safeParse(name);
    if (!parsed.success) {
      throw new InvalidCommandError(name, parsed.error.issues[0]?.message ?? "invalid token");
    }

    this.assertAvailable();
    const command = parsed.data;
    this.slot = { kind: "command", command };
    try {
      await this.driver.sendCommand(command);
    } finally {
      this.slot = null;
    }
  }

  public getStatus(): ExecutionStatus {
    const run = this.lastRun;
    return {
      state: this.state,
      pattern: run?.pattern ?? null,
      batchesSent: run?.batchesSent ?? 0,
      totalBatches: run?.totalBatches ?? 0,
      pointsSent: run?.pointsSent ?? 0,
    };
  }

  public isBusy(): boolean {
    return this.slot !== null;
  }

  public setStateCallback(callback: StateCallback | null): void {
    this.stateCallback = callback;
  }

  public setMessageCallback(callback: MessageCallback | null): void {
    this.driver.setMessageCallback(callback);
  }

  private assertAvailable(): void {
    const slot = this.slot;
    if (slot?.kind === "run") {
      throw new ExecutionBusyError(`running ${slot.run.pattern}`);
    }
    if (slot?.kind === "command") {
      throw new ExecutionBusyError(`waiting for ${slot.command}`);
    }
  }

  private async execute(run: ActiveRun, lines: string[]): Promise<RunOutcome> {
    try {
      // Let run() hand its acknowledgment back before any heavy work
      await nextTurn();

      const { coordinates } = parseThetaRho(lines);
      if (coordinates.length < 2) {
        log(`Not enough coordinates in ${run.pattern} (${coordinates.length}), nothing to send`, "runner");
        return this.finish(run, ExecutionState.COMPLETED, { status: "noop", batchesSent: 0, pointsSent: 0 });
      }

      const points = interpolatePath(coordinates, this.options.stepSize);
      const batches = toBatches(points, this.options.batchSize);
      run.totalBatches = batches.length;
      log(`Run ${run.id}: ${coordinates.length} coordinates, ${points.length} points, ${batches.length} batches`, "runner");
      this.notifyState();

      for (const batch of batches) {
        if (run.abort.signal.aborted) {
          return this.cancelled(run);
        }

        try {
          await this.driver.sendBatch(batch, run.abort.signal);
        } catch (error) {
          if (error instanceof HandshakeAbortedError) {
            return this.cancelled(run);
          }
          throw error;
        }

        run.batchesSent++;
        run.pointsSent += batch.length;
        this.notifyState();
      }

      log(`Run ${run.id} completed: ${run.batchesSent} batches sent`, "runner");
      return this.finish(run, ExecutionState.COMPLETED, this.counts("completed", run));
    } catch (error) {
      const failure =
        error instanceof MotionError
          ? error
          : new InternalRunError(`Run failed: ${describeError(error)}`, { cause: error });
      log(`Run ${run.id} failed: ${failure.message}`, "runner");
      return this.finish(run, ExecutionState.FAILED, {
        status: "failed",
        error: failure,
        batchesSent: run.batchesSent,
        pointsSent: run.pointsSent,
      });
    }
  }

  private cancelled(run: ActiveRun): RunOutcome {
    log(`Run ${run.id} stopped by user after ${run.batchesSent} batches`, "runner");
    return this.finish(run, ExecutionState.CANCELLED, this.counts("cancelled", run));
  }

  private counts(status: "completed" | "cancelled", run: ActiveRun): RunOutcome {
    return { status, batchesSent: run.batchesSent, pointsSent: run.pointsSent };
  }

  private finish(run: ActiveRun, state: ExecutionState, outcome: RunOutcome): RunOutcome {
    if (this.slot?.kind === "run" && this.slot.run === run) {
      this.slot = null;
    }
    this.transition(state);
    return outcome;
  }

  private transition(state: ExecutionState): void {
    this.state = state;
    this.notifyState();
  }

  private notifyState(): void {
    if (this.stateCallback) {
      this.stateCallback(this.getStatus());
    }
  }
}
