import type { NodePath } from "@babel/traverse";
import * as t from "@babel/types";
import { traverse } from "./babel-interop.js";
import { StructuralError } from "./pool-errors.js";
import {
  hashFromImportName,
  importNameForHash,
  isPoolImport,
  poolCallTarget,
  slotName,
} from "./pool-references.js";
import { isReservedIdentifier } from "./reserved-identifiers.js";
import {
  DEFAULT_SOURCE_PATH,
  type FunctionModule,
  locateNode,
  parseFunctionSource,
  renderFunctionModule,
  sortImports,
  splitFunctionModule,
  stripSourcePositions,
  wrapFunctionModule,
} from "./source-adapter.js";

const CHECK_TAG = /^@check\s+(\S+)/;

export interface CanonicalizationResult {
  withDocstring: string;
  withoutDocstring: string;
  docstring: string;
  nameMapping: Record<string, string>;
  aliasMapping: Record<string, string>;
  checks: string[];
}

export interface CanonicalizeOptions {
  filePath?: string;
}

export function canonicalizeFunctionSource(source: string, options: CanonicalizeOptions = {}): CanonicalizationResult {
  const parsed = parseFunctionSource(source, options.filePath ?? DEFAULT_SOURCE_PATH);
  return canonicalizeFunctionModule(splitFunctionModule(parsed));
}

export function canonicalizeFunctionModule(module: FunctionModule): CanonicalizationResult {
  const imports = sortImports(module.imports);
  const aliasMapping = rewritePoolImports(imports, module.filePath);
  const aliasTargets = new Map(Object.entries(aliasMapping).map(([hash, alias]) => [alias, hash]));
  const checks = collectChecks(module, aliasTargets);

  const excluded = new Set<string>(aliasTargets.keys());
  for (const declaration of imports) {
    for (const specifier of declaration.specifiers) {
      excluded.add(specifier.local.name);
    }
  }

  const file = wrapFunctionModule(imports, module.declaration);
  const forward = collectNameSlots(file, module.functionName, excluded);
  rewriteIdentifiers(file, forward, aliasTargets);
  stripSourcePositions(file);

  const nameMapping: Record<string, string> = {};
  for (const [original, slot] of forward) {
    nameMapping[slot] = original;
  }

  return {
    withDocstring: renderFunctionModule(imports, module.declaration, module.docstring),
    withoutDocstring: renderFunctionModule(imports, module.declaration, ""),
    docstring: module.docstring,
    nameMapping,
    aliasMapping,
    checks,
  };
}

export function isRenameableIdentifier(path: NodePath<t.Identifier>): boolean {
  const identifierPath: NodePath = path;
  return isStatementLabel(path) || identifierPath.isReferencedIdentifier() || identifierPath.isBindingIdentifier();
}

// Labels and their break/continue targets are renamed together.
function isStatementLabel(path: NodePath<t.Identifier>): boolean {
  if (path.key !== "label") {
    return false;
  }
  const parent = path.parent;
  return t.isLabeledStatement(parent) || t.isBreakStatement(parent) || t.isContinueStatement(parent);
}

// Normalizes pool specifiers to `object_<hash>` and returns hash -> local alias.
function rewritePoolImports(imports: t.ImportDeclaration[], filePath: string): Record<string, string> {
  const aliasMapping: Record<string, string> = {};

  for (const declaration of imports) {
    if (!isPoolImport(declaration)) {
      continue;
    }
    for (const specifier of declaration.specifiers) {
      if (!t.isImportSpecifier(specifier)) {
        throw new StructuralError(
          locateNode(filePath, specifier),
          "pool imports must be named specifiers of the form object_<hash>",
        );
      }
      if (!t.isIdentifier(specifier.imported)) {
        throw new StructuralError(
          locateNode(filePath, specifier),
          `pool import '${specifier.imported.value}' must be written as an identifier, not a string`,
        );
      }
      const importedName = specifier.imported.name;
      const hash = hashFromImportName(importedName);
      if (hash === undefined) {
        throw new StructuralError(
          locateNode(filePath, specifier),
          `'${importedName}' is not a pool reference; expected object_ followed by 64 lowercase hex digits`,
        );
      }
      const canonicalName = importNameForHash(hash);
      if (specifier.local.name !== canonicalName) {
        aliasMapping[hash] = specifier.local.name;
      }
      specifier.imported = t.identifier(canonicalName);
      specifier.local = t.identifier(canonicalName);
    }
  }

  return aliasMapping;
}

function collectNameSlots(file: t.File, functionName: string, excluded: ReadonlySet<string>): Map<string, string> {
  const forward = new Map<string, string>([[functionName, slotName(0)]]);

  traverse(file, {
    ImportDeclaration(path) {
      path.skip();
    },
    ObjectProperty(path) {
      const { node } = path;
      if (node.shorthand && t.isIdentifier(node.key)) {
        node.key = t.identifier(node.key.name);
        node.shorthand = false;
      }
    },
    Identifier(path) {
      if (!isRenameableIdentifier(path)) {
        return;
      }
      const { name } = path.node;
      if (forward.has(name) || excluded.has(name) || isReservedIdentifier(name)) {
        return;
      }
      forward.set(name, slotName(forward.size));
    },
  });

  return forward;
}

function rewriteIdentifiers(
  file: t.File,
  forward: ReadonlyMap<string, string>,
  aliasTargets: ReadonlyMap<string, string>,
): void {
  traverse(file, {
    ImportDeclaration(path) {
      path.skip();
    },
    Identifier(path) {
      if (!isRenameableIdentifier(path)) {
        return;
      }
      const hash = aliasTargets.get(path.node.name);
      if (hash !== undefined) {
        if (path.isReferencedIdentifier()) {
          path.replaceWith(poolCallTarget(hash));
          path.skip();
        }
        return;
      }
      const slot = forward.get(path.node.name);
      if (slot !== undefined) {
        path.node.name = slot;
      }
    },
  });
}

function collectChecks(module: FunctionModule, aliasTargets: ReadonlyMap<string, string>): string[] {
  const checks: string[] = [];
  for (const line of module.docstring.split("\n")) {
    const match = CHECK_TAG.exec(line.trim());
    if (!match) {
      continue;
    }
    const target = aliasTargets.get(match[1]) ?? hashFromImportName(match[1]);
    if (target === undefined) {
      throw new StructuralError(
        locateNode(module.filePath, module.declaration),
        `@check target '${match[1]}' is neither a pool import alias nor object_<hash>`,
      );
    }
    if (!checks.includes(target)) {
      checks.push(target);
    }
  }
  return checks;
}
