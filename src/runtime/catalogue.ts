import { z } from "zod";
import { DEBUG_ENGINE, loadConfig, type EngineConfig } from "../config";
import type { ExprTree } from "../engine/arena";
import { CatalogueError, MalformedExpressionError } from "../engine/engine-errors";
import { formatTree } from "../engine/format";
import { buildBinaryTree, buildNaryTree } from "../engine/tree-builder";

// ============================================================================
// Raw tables
// ============================================================================

const tokens = z.array(z.string());
const id = z.number().int().nonnegative();

export const LoopRowSchema = z.object({
  kernelName: z.string().min(1),
  loopId: z.number().int().positive(),
  parentLoopId: id.default(0),
  initTokens: tokens,
  finalTokens: tokens,
  stepTokens: tokens.default([]),
  knownIterCount: z.union([z.number().int().nonnegative(), z.bigint()]).optional(),
});

export const ConditionKindSchema = z.enum(["none", "then", "else"]);

export const AccessRowSchema = z.object({
  kernelName: z.string().min(1),
  accessId: id,
  allocationArgIndex: id,
  enclosingLoopId: id.default(0),
  enclosingCondId: id.default(0),
  condKind: ConditionKindSchema.default("none"),
  expressionTokens: tokens,
  /** Parenthesized prefix form of the same address. */
  treeTokens: tokens.optional(),
});

export const PhiLoopRowSchema = z.object({
  kernelName: z.string().min(1),
  phiId: id,
  loopId: z.number().int().positive(),
});

export const CatalogueTablesSchema = z.object({
  loops: z.array(LoopRowSchema).default([]),
  accesses: z.array(AccessRowSchema).default([]),
  phiLoops: z.array(PhiLoopRowSchema).default([]),
});

export type LoopRow = z.input<typeof LoopRowSchema>;
export type AccessRow = z.input<typeof AccessRowSchema>;
export type PhiLoopRow = z.input<typeof PhiLoopRowSchema>;
export type CatalogueTables = z.input<typeof CatalogueTablesSchema>;
export type ConditionKind = z.infer<typeof ConditionKindSchema>;

// ============================================================================
// Records
// ============================================================================

/** Outcome of building one stored expression. */
export type BuiltExpression =
  | { kind: "tree"; tree: ExprTree }
  | { kind: "empty" }
  | { kind: "malformed"; error: MalformedExpressionError };

export type LoopRecord = {
  kernelName: string;
  loopId: number;
  parentLoopId: number;
  init: BuiltExpression;
  final: BuiltExpression;
  step: BuiltExpression;
  knownIterCount?: bigint;
};

export type AccessRecord = {
  kernelName: string;
  accessId: number;
  allocationArgIndex: number;
  enclosingLoopId: number;
  enclosingCondId: number;
  condKind: ConditionKind;
  /** Binary (postfix) form. */
  expression: BuiltExpression;
  /** N-ary form, when the analysis emitted one. */
  tree: BuiltExpression | null;
};

export type KernelCatalogue = {
  name: string;
  loops: ReadonlyMap<number, LoopRecord>;
  accesses: ReadonlyMap<number, AccessRecord>;
  /** phi id → loop id */
  phiLoops: ReadonlyMap<number, number>;
};

type MutableKernel = {
  name: string;
  loops: Map<number, LoopRecord>;
  accesses: Map<number, AccessRecord>;
  phiLoops: Map<number, number>;
};

export type CatalogueOptions = Partial<Pick<EngineConfig, "maxBinaryTokens" | "maxNaryNodes">>;

function build(
  label: string,
  input: readonly string[],
  builder: (t: readonly string[]) => ExprTree | null,
): BuiltExpression {
  try {
    const tree = builder(input);
    if (tree === null) return { kind: "empty" };
    if (DEBUG_ENGINE) console.log(`[catalogue] ${label}: ${formatTree(tree)}`);
    return { kind: "tree", tree };
  } catch (e) {
    if (e instanceof MalformedExpressionError) {
      console.warn(`[catalogue] ${label} is malformed: ${e.message}`);
      return { kind: "malformed", error: e };
    }
    throw e;
  }
}

/**
 * Per-kernel loops, accesses and phi→loop links with every expression built
 * once up front. Read-only after construction; one instance is shared by all
 * invocation passes over the same program.
 */
export class Catalogue {
  private constructor(private readonly kernelsByName: ReadonlyMap<string, KernelCatalogue>) {}

  static fromTables(tables: unknown, options: CatalogueOptions = {}): Catalogue {
    const parsed = CatalogueTablesSchema.safeParse(tables);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; ");
      throw new CatalogueError(`invalid catalogue tables: ${issues}`);
    }
    const config = loadConfig();
    const binary = (t: readonly string[]) =>
      buildBinaryTree(t, { maxSize: options.maxBinaryTokens ?? config.maxBinaryTokens });
    const nary = (t: readonly string[]) =>
      buildNaryTree(t, { maxSize: options.maxNaryNodes ?? config.maxNaryNodes });

    const kernels = new Map<string, MutableKernel>();
    const kernelFor = (name: string): MutableKernel => {
      let kernel = kernels.get(name);
      if (!kernel) {
        kernel = { name, loops: new Map(), accesses: new Map(), phiLoops: new Map() };
        kernels.set(name, kernel);
      }
      return kernel;
    };

    for (const row of parsed.data.loops) {
      const kernel = kernelFor(row.kernelName);
      if (kernel.loops.has(row.loopId)) {
        throw new CatalogueError(`duplicate loop ${row.loopId} in kernel ${row.kernelName}`);
      }
      const label = `${row.kernelName} loop ${row.loopId}`;
      kernel.loops.set(row.loopId, {
        kernelName: row.kernelName,
        loopId: row.loopId,
        parentLoopId: row.parentLoopId,
        init: build(`${label} init`, row.initTokens, binary),
        final: build(`${label} final`, row.finalTokens, binary),
        step: build(`${label} step`, row.stepTokens, binary),
        knownIterCount:
          row.knownIterCount === undefined ? undefined : BigInt(row.knownIterCount),
      });
    }

    for (const row of parsed.data.accesses) {
      const kernel = kernelFor(row.kernelName);
      if (kernel.accesses.has(row.accessId)) {
        throw new CatalogueError(`duplicate access ${row.accessId} in kernel ${row.kernelName}`);
      }
      const label = `${row.kernelName} access ${row.accessId}`;
      kernel.accesses.set(row.accessId, {
        kernelName: row.kernelName,
        accessId: row.accessId,
        allocationArgIndex: row.allocationArgIndex,
        enclosingLoopId: row.enclosingLoopId,
        enclosingCondId: row.enclosingCondId,
        condKind: row.condKind,
        expression: build(label, row.expressionTokens, binary),
        tree: row.treeTokens === undefined ? null : build(`${label} tree`, row.treeTokens, nary),
      });
    }

    for (const row of parsed.data.phiLoops) {
      const kernel = kernelFor(row.kernelName);
      if (kernel.phiLoops.has(row.phiId)) {
        throw new CatalogueError(`phi ${row.phiId} in kernel ${row.kernelName} is mapped twice`);
      }
      kernel.phiLoops.set(row.phiId, row.loopId);
    }

    return new Catalogue(kernels);
  }

  kernel(name: string): KernelCatalogue | undefined {
    return this.kernelsByName.get(name);
  }

  kernelNames(): string[] {
    return [...this.kernelsByName.keys()].sort();
  }
}

export function treeOf(built: BuiltExpression | null): ExprTree | null {
  return built !== null && built.kind === "tree" ? built.tree : null;
}
