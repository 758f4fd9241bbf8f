import * as t from "@babel/types";
import { traverse } from "./babel-interop.js";
import { isRenameableIdentifier } from "./canonicalizer.js";
import { PoolError, SchemaError } from "./pool-errors.js";
import {
  hashFromImportName,
  importNameForHash,
  importedNameOf,
  isPoolImport,
  poolCallTargetHash,
  SLOT_PREFIX,
} from "./pool-references.js";
import {
  type FunctionModule,
  parseFunctionSource,
  renderFunctionModule,
  sortImports,
  splitFunctionModule,
  stripSourcePositions,
  wrapFunctionModule,
} from "./source-adapter.js";

const TEMPLATE_PATH = "<canonical template>";

export interface DenormalizationMapping {
  docstring: string;
  nameMapping: Record<string, string>;
  aliasMapping: Record<string, string>;
}

export function denormalizeFunction(canonicalText: string, mapping: DenormalizationMapping): string {
  const module = readTemplate(canonicalText);
  const { nameMapping, aliasMapping } = mapping;

  for (const declaration of module.imports) {
    if (!isPoolImport(declaration)) {
      continue;
    }
    for (const specifier of declaration.specifiers) {
      if (!t.isImportSpecifier(specifier)) {
        continue;
      }
      const hash = hashFromImportName(importedNameOf(specifier));
      const alias = hash === undefined ? undefined : lookup(aliasMapping, hash);
      if (alias !== undefined) {
        specifier.local = t.identifier(alias);
      }
    }
  }

  const file = wrapFunctionModule(module.imports, module.declaration);
  const corruptions: string[] = [];

  traverse(file, {
    ImportDeclaration(path) {
      path.skip();
    },
    MemberExpression(path) {
      const hash = poolCallTargetHash(path.node);
      if (hash === undefined) {
        return;
      }
      const alias = lookup(aliasMapping, hash);
      if (alias === undefined) {
        if (!importsHash(module, hash)) {
          corruptions.push(`call target ${importNameForHash(hash)} has no matching pool import`);
        }
        return;
      }
      path.replaceWith(t.identifier(alias));
      path.skip();
    },
    Identifier(path) {
      if (!isRenameableIdentifier(path)) {
        return;
      }
      const original = lookup(nameMapping, path.node.name);
      if (original !== undefined) {
        path.node.name = original;
      }
    },
    ObjectProperty: {
      exit(path) {
        const { node } = path;
        if (node.computed || !t.isIdentifier(node.key)) {
          return;
        }
        const value = t.isAssignmentPattern(node.value) ? node.value.left : node.value;
        if (t.isIdentifier(value) && value.name === node.key.name) {
          node.shorthand = true;
        }
      },
    },
  });

  if (corruptions.length > 0) {
    throw new SchemaError("canonical template", corruptions);
  }

  stripSourcePositions(file);
  return renderFunctionModule(module.imports, module.declaration, mapping.docstring);
}

export function replaceDocstring(canonicalText: string, docstring: string): string {
  const module = readTemplate(canonicalText);
  stripSourcePositions(wrapFunctionModule(module.imports, module.declaration));
  return renderFunctionModule(module.imports, module.declaration, docstring);
}

// Re-renders a template in the canonical layout, keeping its docstring.
export function reformatTemplate(text: string): string {
  const module = readTemplate(text);
  const imports = sortImports(module.imports);
  stripSourcePositions(wrapFunctionModule(imports, module.declaration));
  return renderFunctionModule(imports, module.declaration, module.docstring);
}

export function extractDependencies(canonicalText: string): string[] {
  const module = readTemplate(canonicalText);
  return collectPoolHashes(module.imports);
}

export function collectPoolHashes(imports: t.ImportDeclaration[]): string[] {
  const hashes: string[] = [];
  for (const declaration of imports) {
    if (!isPoolImport(declaration)) {
      continue;
    }
    for (const specifier of declaration.specifiers) {
      const hash = t.isImportSpecifier(specifier) ? hashFromImportName(importedNameOf(specifier)) : undefined;
      if (hash !== undefined && !hashes.includes(hash)) {
        hashes.push(hash);
      }
    }
  }
  return hashes;
}

export function stripPoolImports(text: string): string {
  const module = readTemplate(text);
  const imports = module.imports.filter((declaration) => !isPoolImport(declaration));
  stripSourcePositions(wrapFunctionModule(imports, module.declaration));
  return renderFunctionModule(imports, module.declaration, module.docstring);
}

// Rewrites every reference to `fromHash` so the template calls `toHash` instead.
export function replaceDependency(canonicalText: string, fromHash: string, toHash: string): string {
  const module = readTemplate(canonicalText);
  if (!collectPoolHashes(module.imports).includes(fromHash)) {
    throw new SchemaError("canonical template", [`no pool import references ${fromHash}`]);
  }
  const fromName = importNameForHash(fromHash);
  const toName = importNameForHash(toHash);

  for (const declaration of module.imports) {
    if (!isPoolImport(declaration)) {
      continue;
    }
    declaration.specifiers = declaration.specifiers.filter((specifier) => {
      return !(t.isImportSpecifier(specifier) && importedNameOf(specifier) === toName);
    });
    for (const specifier of declaration.specifiers) {
      if (t.isImportSpecifier(specifier) && importedNameOf(specifier) === fromName) {
        specifier.imported = t.identifier(toName);
        specifier.local = t.identifier(toName);
      }
    }
  }
  const imports = sortImports(
    module.imports.filter((declaration) => !isPoolImport(declaration) || declaration.specifiers.length > 0),
  );

  const file = wrapFunctionModule(imports, module.declaration);
  traverse(file, {
    ImportDeclaration(path) {
      path.skip();
    },
    Identifier(path) {
      if (path.node.name === fromName) {
        path.node.name = toName;
      }
    },
  });
  stripSourcePositions(file);
  return renderFunctionModule(imports, module.declaration, module.docstring);
}

// Throws a SchemaError unless `text` parses as a pool source.
export function assertTemplateParses(text: string): void {
  readTemplate(text);
}

// Slots referenced but never declared: names of globals the function reaches by name.
export function collectFreeSlots(canonicalText: string): string[] {
  const module = readTemplate(canonicalText);
  const free: string[] = [];

  traverse(wrapFunctionModule(module.imports, module.declaration), {
    Identifier(path) {
      const { name } = path.node;
      if (!name.startsWith(SLOT_PREFIX) || free.includes(name) || !path.isReferencedIdentifier()) {
        return;
      }
      if (!path.scope.hasBinding(name)) {
        free.push(name);
      }
    },
  });
  return free;
}

function readTemplate(text: string): FunctionModule {
  try {
    return splitFunctionModule(parseFunctionSource(text, TEMPLATE_PATH));
  } catch (error) {
    if (error instanceof PoolError) {
      throw new SchemaError("canonical template", [error.message], { cause: error });
    }
    throw error;
  }
}

function importsHash(module: FunctionModule, hash: string): boolean {
  return collectPoolHashes(module.imports).includes(hash);
}

function lookup(table: Record<string, string>, key: string): string | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined;
}
