import * as t from "@babel/types";
import { isValidHash } from "./content-hash.js";

export const POOL_MODULE = "funcpool/pool";

// A hash may start with a digit, which is not a valid identifier start.
export const POOL_IMPORT_PREFIX = "object_";

export const SLOT_PREFIX = "_fp_v_";

export const CALL_SLOT = slotName(0);

export function slotName(index: number): string {
  return `${SLOT_PREFIX}${index}`;
}

export function importNameForHash(hash: string): string {
  return `${POOL_IMPORT_PREFIX}${hash}`;
}

export function hashFromImportName(name: string): string | undefined {
  if (!name.startsWith(POOL_IMPORT_PREFIX)) {
    return undefined;
  }
  const hash = name.slice(POOL_IMPORT_PREFIX.length);
  return isValidHash(hash) ? hash : undefined;
}

export function isPoolImport(declaration: t.ImportDeclaration): boolean {
  return declaration.source.value === POOL_MODULE;
}

export function importedNameOf(specifier: t.ImportSpecifier): string {
  return t.isIdentifier(specifier.imported) ? specifier.imported.name : specifier.imported.value;
}

export function poolCallTarget(hash: string): t.MemberExpression {
  return t.memberExpression(t.identifier(importNameForHash(hash)), t.identifier(CALL_SLOT));
}

// Returns the hash when `node` is `object_<hash>._fp_v_0`.
export function poolCallTargetHash(node: t.MemberExpression): string | undefined {
  if (node.computed || !t.isIdentifier(node.object) || !t.isIdentifier(node.property)) {
    return undefined;
  }
  if (node.property.name !== CALL_SLOT) {
    return undefined;
  }
  return hashFromImportName(node.object.name);
}
