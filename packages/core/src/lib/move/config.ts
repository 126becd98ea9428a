/**
 * Declarative Move package configs.
 *
 * A package lists its modules, each module its functions, each function
 * the named parameters a visualizer reads, with their argument index and
 * value type. Lookups by name throw `UnsupportedNameError` so a visualizer
 * can tell "not ours" apart from a decoding problem.
 */

import { decodePure } from "./bcs";
import type { MoveValue, MoveValueType } from "./bcs";
import type { MoveCallCommand, MoveInput } from "./types";
import { normalizeMoveId } from "./types";

export interface MoveParameterSpec {
  readonly name: string;
  readonly index: number;
  readonly type: MoveValueType;
}

export interface MoveFunctionSpec {
  readonly name: string;
  readonly parameters: readonly MoveParameterSpec[];
}

export interface MoveModuleSpec {
  readonly name: string;
  readonly functions: readonly MoveFunctionSpec[];
}

export interface MovePackageConfig {
  readonly key: string;
  readonly packageId: string;
  readonly modules: readonly MoveModuleSpec[];
}

export class UnsupportedNameError extends Error {
  constructor(
    readonly kind: "module" | "function" | "parameter",
    readonly unsupportedName: string,
    readonly scope: string
  ) {
    super(`Unsupported ${kind} name "${unsupportedName}" in ${scope}`);
    this.name = "UnsupportedNameError";
  }
}

function assertUnique(names: readonly string[], scope: string): void {
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) throw new Error(`Duplicate name "${name}" in ${scope}`);
    seen.add(name);
  }
}

/**
 * Validate and freeze a package config. The package id is normalized.
 */
export function defineMovePackage(config: MovePackageConfig): MovePackageConfig {
  assertUnique(config.modules.map((m) => m.name), config.key);
  const modules = config.modules.map((module) => {
    const scope = `${config.key}::${module.name}`;
    assertUnique(module.functions.map((f) => f.name), scope);
    const functions = module.functions.map((fn) => {
      assertUnique(fn.parameters.map((p) => p.name), `${scope}::${fn.name}`);
      assertUnique(fn.parameters.map((p) => String(p.index)), `${scope}::${fn.name} indexes`);
      return Object.freeze({
        name: fn.name,
        parameters: Object.freeze(fn.parameters.map((p) => Object.freeze({ ...p }))),
      });
    });
    return Object.freeze({ name: module.name, functions: Object.freeze(functions) });
  });
  return Object.freeze({ key: config.key, packageId: normalizeMoveId(config.packageId), modules: Object.freeze(modules) });
}

// ── Name resolution ─────────────────────────────────────────────────

export function resolveModule(config: MovePackageConfig, moduleName: string): MoveModuleSpec {
  const module = config.modules.find((m) => m.name === moduleName);
  if (!module) throw new UnsupportedNameError("module", moduleName, config.key);
  return module;
}

export function resolveFunction(config: MovePackageConfig, moduleName: string, functionName: string): MoveFunctionSpec {
  const fn = resolveModule(config, moduleName).functions.find((f) => f.name === functionName);
  if (!fn) throw new UnsupportedNameError("function", functionName, `${config.key}::${moduleName}`);
  return fn;
}

function resolveParameter(fn: MoveFunctionSpec, name: string): MoveParameterSpec {
  const parameter = fn.parameters.find((p) => p.name === name);
  if (!parameter) throw new UnsupportedNameError("parameter", name, fn.name);
  return parameter;
}

export function parameterIndex(fn: MoveFunctionSpec, name: string): number {
  return resolveParameter(fn, name).index;
}

/** True when the call targets this package, whatever the id's spelling. */
export function isPackageCall(config: MovePackageConfig, call: MoveCallCommand): boolean {
  return normalizeMoveId(call.package) === config.packageId;
}

// ── Parameter reading ───────────────────────────────────────────────

/**
 * Decode a named parameter of a call from the pure input it points at.
 */
export function readParameter(
  fn: MoveFunctionSpec,
  call: MoveCallCommand,
  inputs: readonly MoveInput[],
  name: string
): MoveValue {
  const parameter = resolveParameter(fn, name);
  const argument = call.arguments[parameter.index];
  if (!argument || argument.kind !== "input") {
    throw new Error(`Argument ${parameter.index} of ${fn.name} is not a transaction input`);
  }
  const input = inputs[argument.index];
  if (!input || input.kind !== "pure") {
    throw new Error(`Input ${argument.index} for ${fn.name}.${name} is not a pure value`);
  }
  return decodePure(parameter.type, input.bytes);
}

export function readIntegerParameter(
  fn: MoveFunctionSpec,
  call: MoveCallCommand,
  inputs: readonly MoveInput[],
  name: string
): bigint {
  const value = readParameter(fn, call, inputs, name);
  if (typeof value !== "bigint") throw new Error(`${fn.name}.${name} is not an integer`);
  return value;
}

export function readBoolParameter(
  fn: MoveFunctionSpec,
  call: MoveCallCommand,
  inputs: readonly MoveInput[],
  name: string
): boolean {
  const value = readParameter(fn, call, inputs, name);
  if (typeof value !== "boolean") throw new Error(`${fn.name}.${name} is not a bool`);
  return value;
}
