import type { GeneratorOptions } from "@babel/generator";
import { parse } from "@babel/parser";
import * as t from "@babel/types";
import { generate } from "./babel-interop.js";
import { SourceSyntaxError, StructuralError, type SourceLocation } from "./pool-errors.js";
import { importedNameOf } from "./pool-references.js";

const GENERATOR_OPTIONS: GeneratorOptions = {
  comments: false,
  compact: false,
  retainLines: false,
  jsescOption: { minimal: true },
};

export const DEFAULT_SOURCE_PATH = "<source>";

export interface ParsedModule {
  file: t.File;
  filePath: string;
}

export interface FunctionModule {
  imports: t.ImportDeclaration[];
  declaration: t.FunctionDeclaration;
  functionName: string;
  docstring: string;
  filePath: string;
}

export function parseFunctionSource(text: string, filePath = DEFAULT_SOURCE_PATH): ParsedModule {
  try {
    const file = parse(text, {
      sourceType: "module",
      sourceFilename: filePath,
      attachComment: false,
    });
    return { file, filePath };
  } catch (error) {
    const position = readErrorPosition(error);
    const reason = error instanceof Error ? error.message.replace(/\s*\(\d+:\d+\)$/, "") : String(error);
    throw new SourceSyntaxError({ filePath, ...position }, reason, { cause: error });
  }
}

export function splitFunctionModule(parsed: ParsedModule): FunctionModule {
  const { file, filePath } = parsed;
  const program = file.program;

  if (program.directives.length > 0) {
    const directive = program.directives[0];
    throw new StructuralError(
      locateNode(filePath, directive),
      `top-level directive "${directive.value.value}" is not allowed; a pool source holds imports and one function`,
    );
  }

  const imports: t.ImportDeclaration[] = [];
  let declaration: t.FunctionDeclaration | undefined;

  for (const statement of program.body) {
    if (t.isImportDeclaration(statement)) {
      imports.push(statement);
      continue;
    }
    if (t.isFunctionDeclaration(statement)) {
      if (declaration) {
        throw new StructuralError(
          locateNode(filePath, statement),
          "expected exactly one top-level function declaration, found a second one",
        );
      }
      declaration = statement;
      continue;
    }
    throw new StructuralError(
      locateNode(filePath, statement),
      `top-level ${statement.type} is not allowed; only import declarations and one function declaration`,
    );
  }

  if (!declaration) {
    throw new StructuralError({ filePath, line: 1, column: 1 }, "no top-level function declaration found");
  }
  if (!declaration.id) {
    throw new StructuralError(locateNode(filePath, declaration), "the function declaration must be named");
  }

  return {
    imports,
    declaration,
    functionName: declaration.id.name,
    docstring: extractDocstring(file, declaration),
    filePath,
  };
}

export function renderFunctionModule(
  imports: t.ImportDeclaration[],
  declaration: t.FunctionDeclaration,
  docstring: string,
): string {
  const parts = imports.map((declarationNode) => generateCode(declarationNode));
  const normalizedDocstring = normalizeDocstring(docstring);
  if (normalizedDocstring.length > 0) {
    parts.push(renderDocBlock(normalizedDocstring));
  }
  parts.push(generateCode(declaration));
  return parts.join("\n");
}

export function generateCode(node: t.Node): string {
  return generate(node, GENERATOR_OPTIONS).code;
}

export function renderDocBlock(docstring: string): string {
  const lines = normalizeDocstring(docstring)
    .split("\n")
    .map((line) => line.replace(/\*\//g, "*\\/"))
    .map((line) => (line.length > 0 ? ` * ${line}` : " *"));
  return ["/**", ...lines, " */"].join("\n");
}

// `value` is the comment body between `/*` and `*/`.
export function parseDocBlock(value: string): string {
  const body = value.startsWith("*") ? value.slice(1) : value;
  const lines = body.split(/\r?\n/).map((line) => line.replace(/^\s*\*? ?/, "").replace(/\*\\\//g, "*/"));
  return normalizeDocstring(lines.join("\n"));
}

export function normalizeDocstring(text: string): string {
  const lines = text
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((line) => line.trimEnd());

  let start = 0;
  let end = lines.length;
  while (start < end && lines[start].length === 0) {
    start += 1;
  }
  while (end > start && lines[end - 1].length === 0) {
    end -= 1;
  }
  return lines.slice(start, end).join("\n");
}

export function stripSourcePositions<T extends t.Node>(node: T): T {
  t.removePropertiesDeep(node);
  t.traverseFast(node, (child) => {
    child.extra = undefined;
  });
  return node;
}

export function sortImports(imports: t.ImportDeclaration[]): t.ImportDeclaration[] {
  return imports
    .map((declaration) => ({ declaration, key: importSortKey(declaration) }))
    .sort((left, right) => compareSortKeys(left.key, right.key))
    .map((entry) => entry.declaration);
}

export function wrapFunctionModule(imports: t.ImportDeclaration[], declaration: t.FunctionDeclaration): t.File {
  return t.file(t.program([...imports, declaration], [], "module"));
}

function importSortKey(declaration: t.ImportDeclaration): string[] {
  const kind = declaration.specifiers.length === 0 ? "side-effect" : "binding";
  const names = declaration.specifiers
    .map((specifier) => {
      if (t.isImportDefaultSpecifier(specifier)) {
        return "default";
      }
      if (t.isImportNamespaceSpecifier(specifier)) {
        return "*";
      }
      return importedNameOf(specifier);
    })
    .sort();
  return [kind, declaration.source.value, ...names];
}

function compareSortKeys(left: string[], right: string[]): number {
  const length = Math.min(left.length, right.length);
  for (let index = 0; index < length; index += 1) {
    if (left[index] !== right[index]) {
      return left[index] < right[index] ? -1 : 1;
    }
  }
  return left.length - right.length;
}

function extractDocstring(file: t.File, declaration: t.FunctionDeclaration): string {
  const functionStart = declaration.start ?? 0;
  let previousEnd = 0;
  for (const statement of file.program.body) {
    const end = statement.end ?? 0;
    if (statement !== declaration && end <= functionStart && end > previousEnd) {
      previousEnd = end;
    }
  }

  let docBlock: t.CommentBlock | undefined;
  for (const comment of file.comments ?? []) {
    const start = comment.start ?? 0;
    const end = comment.end ?? 0;
    if (comment.type === "CommentBlock" && comment.value.startsWith("*") && start >= previousEnd && end <= functionStart) {
      docBlock = comment;
    }
  }
  return docBlock ? parseDocBlock(docBlock.value) : "";
}

export function locateNode(filePath: string, node: t.Node): SourceLocation {
  const start = node.loc?.start;
  return {
    filePath,
    line: start?.line ?? 1,
    column: (start?.column ?? 0) + 1,
  };
}

function readErrorPosition(error: unknown): { line: number; column: number } {
  if (typeof error === "object" && error !== null && "loc" in error) {
    const loc: unknown = error.loc;
    if (typeof loc === "object" && loc !== null && "line" in loc && "column" in loc) {
      const { line, column } = loc;
      if (typeof line === "number" && typeof column === "number") {
        return { line, column: column + 1 };
      }
    }
  }
  return { line: 1, column: 1 };
}
