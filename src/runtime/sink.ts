import type { Value } from "../engine/values";
import type { LoopIterations } from "../engine/loops";
import type { ActualValue } from "./invocation";

export type AllocationRef<H> = {
  argIndex: number;
  /** Binding of the allocation argument in this invocation, if any. */
  actual: ActualValue<H> | null;
};

export type AccessKey<H> = {
  invocationId: number;
  accessId: number;
  allocation: AllocationRef<H>;
};

export type SensitivityAxis = "bidx" | "bidy" | "phi" | "hostLoop";

/** `conditional`: the access sits under a branch, so its execution count is an upper bound. */
export type AccessFlag = "pointer-chase" | "indirect" | "incomputable" | "conditional";

/** Consumer of everything one invocation pass produces. */
export interface RuntimeSink<H> {
  executionCount(key: AccessKey<H>, value: Value<H>): void;
  workingSetSize(key: AccessKey<H>, value: Value<H>): void;
  sensitivity(key: AccessKey<H>, axis: SensitivityAxis, value: Value<H>): void;
  loopIterations(
    invocationId: number,
    kernelName: string,
    loopId: number,
    result: LoopIterations<H>,
  ): void;
  flag(key: AccessKey<H>, flag: AccessFlag, detail?: string): void;
}

export type AccessReport<H> = {
  key: AccessKey<H>;
  executionCount?: Value<H>;
  workingSetSize?: Value<H>;
  sensitivities: Partial<Record<SensitivityAxis, Value<H>>>;
  flags: Array<{ flag: AccessFlag; detail?: string }>;
};

/** Keeps every report in memory, keyed by invocation and access id. */
export class RecordingSink<H> implements RuntimeSink<H> {
  private readonly accesses = new Map<string, AccessReport<H>>();
  private readonly loops = new Map<string, LoopIterations<H>>();

  executionCount(key: AccessKey<H>, value: Value<H>): void {
    this.entry(key).executionCount = value;
  }

  workingSetSize(key: AccessKey<H>, value: Value<H>): void {
    this.entry(key).workingSetSize = value;
  }

  sensitivity(key: AccessKey<H>, axis: SensitivityAxis, value: Value<H>): void {
    this.entry(key).sensitivities[axis] = value;
  }

  loopIterations(
    invocationId: number,
    kernelName: string,
    loopId: number,
    result: LoopIterations<H>,
  ): void {
    this.loops.set(`${invocationId}:${kernelName}:${loopId}`, result);
  }

  flag(key: AccessKey<H>, flag: AccessFlag, detail?: string): void {
    this.entry(key).flags.push(detail === undefined ? { flag } : { flag, detail });
  }

  access(invocationId: number, accessId: number): AccessReport<H> | undefined {
    return this.accesses.get(`${invocationId}:${accessId}`);
  }

  loop(invocationId: number, kernelName: string, loopId: number): LoopIterations<H> | undefined {
    return this.loops.get(`${invocationId}:${kernelName}:${loopId}`);
  }

  get size(): number {
    return this.accesses.size;
  }

  private entry(key: AccessKey<H>): AccessReport<H> {
    const id = `${key.invocationId}:${key.accessId}`;
    let report = this.accesses.get(id);
    if (!report) {
      report = { key, sensitivities: {}, flags: [] };
      this.accesses.set(id, report);
    }
    return report;
  }
}
