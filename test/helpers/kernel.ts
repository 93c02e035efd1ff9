/**
 * Shared builders for catalogue and invocation fixtures.
 */

import type { ExprTree } from "../../src/engine/arena";
import { ExpressionEvaluator } from "../../src/engine/interval";
import { buildBinaryTree, buildNaryTree } from "../../src/engine/tree-builder";
import type { Emitter, Value } from "../../src/engine/values";
import { Catalogue, type CatalogueTables, type KernelCatalogue } from "../../src/runtime/catalogue";
import { dim3, type ActualValue, type InvocationRecord } from "../../src/runtime/invocation";

export function postfix(source: string): ExprTree {
  const tree = buildBinaryTree(source.split(" "));
  if (tree === null) throw new Error(`no tree for "${source}"`);
  return tree;
}

export function prefix(source: string): ExprTree {
  const tree = buildNaryTree(source.split(" "));
  if (tree === null) throw new Error(`no tree for "${source}"`);
  return tree;
}

export function constArgs(values: Record<number, number>): Map<number, ActualValue<string>> {
  return new Map(
    Object.entries(values).map(([index, value]) => [
      Number(index),
      { kind: "constant", value: BigInt(value) },
    ]),
  );
}

export function invocation(
  overrides: Partial<InvocationRecord<string>> = {},
): InvocationRecord<string> {
  return {
    invocationId: 1,
    kernelName: "k",
    grid: dim3(4),
    block: dim3(32),
    args: new Map(),
    ...overrides,
  };
}

export function kernelOf(tables: CatalogueTables, name = "k"): KernelCatalogue {
  const kernel = Catalogue.fromTables(tables).kernel(name);
  if (kernel === undefined) throw new Error(`kernel ${name} missing from fixture`);
  return kernel;
}

export function emptyKernel(name = "k"): KernelCatalogue {
  return { name, loops: new Map(), accesses: new Map(), phiLoops: new Map() };
}

export function evaluatorFor(
  inv: InvocationRecord<string>,
  kernel: KernelCatalogue = emptyKernel(inv.kernelName),
  emitter: Emitter<string> | null = null,
): ExpressionEvaluator<string> {
  return new ExpressionEvaluator(kernel, inv, emitter);
}

export function knownValue(value: Value<unknown>): bigint {
  if (value.kind !== "known") {
    throw new Error(`expected a known value, got handle ${String(value.handle)}`);
  }
  return value.value;
}
