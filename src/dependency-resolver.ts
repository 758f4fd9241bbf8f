import { createRequire } from "node:module";
import path from "node:path";
import vm from "node:vm";
import * as t from "@babel/types";
import { collectFreeSlots, collectPoolHashes, denormalizeFunction, stripPoolImports } from "./denormalizer.js";
import { DEFAULT_LANGUAGE } from "./language-codes.js";
import { createSilentLogger, type Logger } from "./logger.js";
import {
  AmbiguousMappingError,
  describeError,
  ExecutionError,
  NotFoundError,
} from "./pool-errors.js";
import { CALL_SLOT, hashFromImportName, importedNameOf, importNameForHash, isPoolImport } from "./pool-references.js";
import type { PoolStorage } from "./pool-storage.js";
import type { LocalizationMapping, MappingSummary } from "./pool-types.js";
import { type FunctionModule, generateCode, parseFunctionSource, splitFunctionModule } from "./source-adapter.js";

export type PoolFunction = (...args: unknown[]) => unknown;

export type ResolutionState = "pending" | "loading" | "loaded";

export type AmbiguityPolicy = "error" | "lowest-hash";

export interface ResolveOptions {
  languages?: string[];
  mappingSelections?: Record<string, string>;
  ambiguity?: AmbiguityPolicy;
  moduleBase?: string;
  logger?: Logger;
}

export interface PoolModuleBinding {
  hash: string;
  call?: PoolFunction;
  exports: Record<string, unknown>;
}

// Shared by every function loaded in one resolution.
export interface BindingEnvironment {
  modules: Map<string, PoolModuleBinding>;
  states: Map<string, ResolutionState>;
}

export interface ResolvedUnit {
  hash: string;
  language: string;
  mappingHash: string;
  functionName: string;
  source: string;
  dependencies: string[];
}

export interface ResolvedFunction {
  hash: string;
  call: PoolFunction;
  order: string[];
  units: ResolvedUnit[];
  environment: BindingEnvironment;
}

interface PreparedUnit extends ResolvedUnit {
  module: FunctionModule;
}

interface Frame {
  hash: string;
  prepared?: PreparedUnit;
}

export async function resolveFunction(
  storage: PoolStorage,
  hash: string,
  options: ResolveOptions = {},
): Promise<ResolvedFunction> {
  const log = (options.logger ?? createSilentLogger()).child({ service: "resolver" });
  const environment: BindingEnvironment = { modules: new Map(), states: new Map() };
  const loadModule = createModuleLoader(options.moduleBase ?? process.cwd());
  const order: string[] = [];
  const units: ResolvedUnit[] = [];

  environment.states.set(hash, "pending");
  const stack: Frame[] = [{ hash }];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];

    if (!frame.prepared) {
      const state = environment.states.get(frame.hash);
      if (state === "loading" || state === "loaded") {
        stack.pop();
        continue;
      }
      environment.states.set(frame.hash, "loading");
      if (!environment.modules.has(frame.hash)) {
        environment.modules.set(frame.hash, { hash: frame.hash, exports: {} });
      }
      frame.prepared = await prepareUnit(storage, frame.hash, options);
      log.debug("Loaded pool function", { hash: frame.hash, language: frame.prepared.language });

      for (const dependency of frame.prepared.dependencies.slice().reverse()) {
        const dependencyState = environment.states.get(dependency);
        if (dependencyState === undefined || dependencyState === "pending") {
          environment.states.set(dependency, "pending");
          stack.push({ hash: dependency });
        }
      }
      continue;
    }

    stack.pop();
    linkUnit(frame.prepared, environment, loadModule);
    environment.states.set(frame.hash, "loaded");
    order.push(frame.hash);
    units.push(toResolvedUnit(frame.prepared));
  }

  const root = environment.modules.get(hash)?.call;
  if (!root) {
    throw new ExecutionError(hash, "function was not linked", undefined);
  }
  return { hash, call: root, order, units, environment };
}

export async function runFunction(
  storage: PoolStorage,
  hash: string,
  args: unknown[],
  options: ResolveOptions = {},
): Promise<unknown> {
  const resolved = await resolveFunction(storage, hash, { ambiguity: "lowest-hash", ...options });
  try {
    return await resolved.call(...args);
  } catch (error) {
    if (error instanceof ExecutionError) {
      throw error;
    }
    throw new ExecutionError(hash, describeError(error), error);
  }
}

export function parseRunArguments(values: string[]): unknown[] {
  return values.map((value) => {
    try {
      const parsed: unknown = JSON.parse(value);
      return parsed;
    } catch {
      return value;
    }
  });
}

async function prepareUnit(storage: PoolStorage, hash: string, options: ResolveOptions): Promise<PreparedUnit> {
  const object = await storage.loadObject(hash);
  const mapping = await selectMapping(storage, hash, object.normalizedCode, options);
  const denormalized = denormalizeFunction(object.normalizedCode, mapping);
  const module = splitFunctionModule(parseFunctionSource(denormalized, `funcpool:${hash}`));

  return {
    hash,
    language: mapping.language,
    mappingHash: mapping.mappingHash,
    functionName: module.functionName,
    source: stripPoolImports(denormalized),
    dependencies: collectPoolHashes(module.imports),
    module,
  };
}

function toResolvedUnit(prepared: PreparedUnit): ResolvedUnit {
  return {
    hash: prepared.hash,
    language: prepared.language,
    mappingHash: prepared.mappingHash,
    functionName: prepared.functionName,
    source: prepared.source,
    dependencies: prepared.dependencies.slice(),
  };
}

async function selectMapping(
  storage: PoolStorage,
  hash: string,
  normalizedCode: string,
  options: ResolveOptions,
): Promise<LocalizationMapping> {
  const languages = options.languages && options.languages.length > 0 ? options.languages : [DEFAULT_LANGUAGE];
  const selected = options.mappingSelections?.[hash];

  for (const language of languages) {
    const selection = await storage.loadMapping(hash, language, selected);
    if (selection.status === "selected") {
      return selection.mapping;
    }
    if (selection.status === "ambiguous") {
      if (options.ambiguity === "lowest-hash") {
        return pickInterchangeableMapping(storage, hash, language, normalizedCode, selection.candidates);
      }
      throw new AmbiguousMappingError(hash, language, selection.candidates);
    }
  }

  throw new NotFoundError("language", `${hash} has no mapping in ${languages.join(", ")}`);
}

// Variants may only differ in names the function declares; a free slot names a global it calls.
async function pickInterchangeableMapping(
  storage: PoolStorage,
  hash: string,
  language: string,
  normalizedCode: string,
  candidates: MappingSummary[],
): Promise<LocalizationMapping> {
  const mappings = await Promise.all(
    candidates.map((candidate) => storage.readMapping(hash, language, candidate.mappingHash)),
  );
  const [lowest] = mappings;
  for (const slot of collectFreeSlots(normalizedCode)) {
    const targets = new Set(mappings.map((mapping) => mapping.nameMapping[slot]));
    if (targets.size > 1) {
      throw new AmbiguousMappingError(hash, language, candidates);
    }
  }
  return lowest;
}

function linkUnit(unit: PreparedUnit, environment: BindingEnvironment, loadModule: (source: string) => unknown): void {
  const { module } = unit;
  const bindings = new Map<string, unknown>();

  for (const declaration of module.imports) {
    if (isPoolImport(declaration)) {
      bindPoolImport(declaration, bindings, environment);
    } else {
      bindHostImport(unit.hash, declaration, bindings, loadModule);
    }
  }

  const binding = environment.modules.get(unit.hash) ?? { hash: unit.hash, exports: {} };
  environment.modules.set(unit.hash, binding);

  // Every unit is a closure over its own imports, evaluated in the caller's realm.
  const parameters = [...bindings.keys()];
  const factorySource = [
    `(function (${parameters.join(", ")}) {`,
    '"use strict";',
    generateCode(module.declaration),
    `return ${unit.functionName};`,
    "})",
  ].join("\n");

  let candidate: unknown;
  try {
    const factory: unknown = new vm.Script(factorySource, { filename: `funcpool:${unit.hash}` }).runInThisContext();
    if (typeof factory !== "function") {
      throw new TypeError("module factory is not a function");
    }
    candidate = Reflect.apply(factory, undefined, [...bindings.values()]);
  } catch (error) {
    throw new ExecutionError(unit.hash, `could not evaluate ${unit.functionName}: ${describeError(error)}`, error);
  }
  if (typeof candidate !== "function") {
    throw new ExecutionError(unit.hash, `${unit.functionName} did not evaluate to a function`, undefined);
  }

  const target = candidate;
  const fn: PoolFunction = (...args) => Reflect.apply(target, undefined, args);
  binding.call = fn;
  binding.exports[CALL_SLOT] = fn;
}

function bindPoolImport(
  declaration: t.ImportDeclaration,
  bindings: Map<string, unknown>,
  environment: BindingEnvironment,
): void {
  for (const specifier of declaration.specifiers) {
    if (!t.isImportSpecifier(specifier)) {
      continue;
    }
    const hash = hashFromImportName(importedNameOf(specifier));
    if (hash === undefined) {
      continue;
    }
    const binding = environment.modules.get(hash) ?? { hash, exports: {} };
    environment.modules.set(hash, binding);

    if (specifier.local.name === importNameForHash(hash)) {
      binding.exports[CALL_SLOT] ??= createTrampoline(binding);
      bindings.set(specifier.local.name, binding.exports);
    } else {
      bindings.set(specifier.local.name, createTrampoline(binding));
    }
  }
}

// Calls the dependency lazily so a cycle can bind to a module that is still loading.
function createTrampoline(binding: PoolModuleBinding): PoolFunction {
  return (...args) => {
    if (!binding.call) {
      throw new ExecutionError(binding.hash, "dependency is not linked yet", undefined);
    }
    return binding.call(...args);
  };
}

function bindHostImport(
  hash: string,
  declaration: t.ImportDeclaration,
  bindings: Map<string, unknown>,
  loadModule: (source: string) => unknown,
): void {
  const source = declaration.source.value;
  let loaded: unknown;
  try {
    loaded = loadModule(source);
  } catch (error) {
    throw new ExecutionError(hash, `cannot load module '${source}': ${describeError(error)}`, error);
  }

  for (const specifier of declaration.specifiers) {
    if (t.isImportNamespaceSpecifier(specifier)) {
      bindings.set(specifier.local.name, loaded);
    } else if (t.isImportDefaultSpecifier(specifier)) {
      bindings.set(specifier.local.name, readExport(loaded, "default") ?? loaded);
    } else {
      const name = importedNameOf(specifier);
      const value = readExport(loaded, name);
      if (value === undefined) {
        throw new ExecutionError(hash, `module '${source}' has no export '${name}'`, undefined);
      }
      bindings.set(specifier.local.name, value);
    }
  }
}

function readExport(loaded: unknown, name: string): unknown {
  if ((typeof loaded === "object" && loaded !== null) || typeof loaded === "function") {
    const value: unknown = Reflect.get(loaded, name);
    return value;
  }
  return undefined;
}

function createModuleLoader(base: string): (source: string) => unknown {
  const require = createRequire(path.join(path.resolve(base), "funcpool-loader.js"));
  return (source) => {
    const loaded: unknown = require(source);
    return loaded;
  };
}
