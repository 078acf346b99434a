import {
  buildRegistry,
  createGeneratorConfig,
  createNameMappings,
  type GeneratorConfigInput,
  type NameMappingEntry,
  parseDump,
  type TypeDeclaration,
  type TypeRegistry,
} from "@wrapgen/frontend";
import type { EmitResult } from "./types.js";

export type Fixture = {
  readonly declarations: readonly TypeDeclaration[];
  readonly registry: TypeRegistry;
};

export const typeWithMethod = (name: string): string[] => [
  `public class ${name}`,
  "{",
  "\t// Methods",
  "\tpublic void Touch() { }",
  "}",
];

export const buildFixture = (
  dump: readonly string[],
  input: GeneratorConfigInput = {},
  mappings: readonly NameMappingEntry[] = []
): Fixture => {
  const declarations = parseDump(dump.join("\n"));
  const registry = buildRegistry(
    declarations,
    createGeneratorConfig(input),
    createNameMappings(mappings)
  );
  return { declarations, registry };
};

export const fileLines = (
  result: EmitResult,
  fileName: string
): readonly string[] => {
  const text = result.files.get(fileName);
  if (text === undefined) {
    throw new Error(
      `No file '${fileName}' (got: ${[...result.files.keys()].join(", ")})`
    );
  }
  return text.split("\n");
};

const NAMESPACE_LINE = /^namespace (\S+)$/;
const TYPE_LINE =
  /^ {4}public (?:partial )?(?:class|struct|interface|enum) (\S+)(?: : (.+))?$/;
const DELEGATE_LINE = /^ {4}public delegate (.+) (\S+)\((.*)\);$/;
const METHOD_LINE = /^ {8}public (?:static )?(.+) (\S+)\((.*)\)$/;
const MEMBER_LINE = /^ {8}public (?:static )?([^(=]+) (\S+?);?$/;
const TYPE_TEXT_SEPARATORS = /[<>,[\]?\s]+/;

/**
 * Split a parameter list at top-level commas and keep the type texts.
 */
const parameterTypes = (list: string): string[] => {
  const types: string[] = [];
  let depth = 0;
  let current = "";
  for (const ch of `${list},`) {
    if (ch === "," && depth === 0) {
      const parameter = current.trim();
      if (parameter !== "") {
        types.push(parameter.slice(0, parameter.lastIndexOf(" ")));
      }
      current = "";
      continue;
    }
    depth += ch === "<" ? 1 : ch === ">" ? -1 : 0;
    current += ch;
  }
  return types;
};

type Reference = {
  readonly typeText: string;
  readonly isBase: boolean;
};

const referencesOf = (line: string): readonly Reference[] => {
  const typeLine = TYPE_LINE.exec(line);
  if (typeLine !== null) {
    const base = typeLine[2];
    return base === undefined ? [] : [{ typeText: base, isBase: true }];
  }
  const signature = DELEGATE_LINE.exec(line) ?? METHOD_LINE.exec(line);
  if (signature !== null) {
    return [signature[1] ?? "", ...parameterTypes(signature[3] ?? "")].map(
      (typeText) => ({ typeText, isBase: false })
    );
  }
  const member = MEMBER_LINE.exec(line);
  return member === null ? [] : [{ typeText: member[1] ?? "", isBase: false }];
};

/**
 * Type names the emitted files use but never declare. Each entry reads
 * "<file>: <name>". Names are checked against the file's own namespace,
 * the imported namespaces and the builtin tables; knownBaseTypes only
 * count in base position.
 */
export const undeclaredReferences = (
  result: EmitResult,
  registry: TypeRegistry
): readonly string[] => {
  const { config } = registry;
  const files = [...result.files].map(([fileName, text]) => {
    const lines = text.split("\n");
    const namespace =
      lines.map((line) => NAMESPACE_LINE.exec(line)?.[1]).find(Boolean) ?? "";
    return { fileName, lines, namespace };
  });

  const declared = new Map<string, Set<string>>();
  for (const { lines, namespace } of files) {
    const names = declared.get(namespace) ?? new Set<string>();
    declared.set(namespace, names);
    for (const line of lines) {
      const name =
        TYPE_LINE.exec(line)?.[1] ?? DELEGATE_LINE.exec(line)?.[2];
      if (name !== undefined) {
        names.add(name);
      }
    }
  }

  const memberExternals = new Set([
    ...config.builtinTypes,
    ...config.primitiveTypeMap.values(),
    ...config.knownGenericTypes,
  ]);
  const baseExternals = new Set([
    ...memberExternals,
    ...config.knownBaseTypes,
  ]);

  const isDeclared = (
    token: string,
    namespace: string,
    externals: ReadonlySet<string>
  ): boolean => {
    const dot = token.lastIndexOf(".");
    if (dot >= 0) {
      const names = declared.get(token.slice(0, dot));
      const name = token.slice(dot + 1);
      return names !== undefined ? names.has(name) : externals.has(name);
    }
    return (
      externals.has(token) ||
      [namespace, ...registry.imports].some(
        (ns) => declared.get(ns)?.has(token) ?? false
      )
    );
  };

  return files.flatMap(({ fileName, lines, namespace }) =>
    lines.flatMap(referencesOf).flatMap(({ typeText, isBase }) =>
      typeText
        .replace(/global::/g, "")
        .split(TYPE_TEXT_SEPARATORS)
        .filter((token) => token !== "")
        .filter(
          (token) =>
            !isDeclared(
              token,
              namespace,
              isBase ? baseExternals : memberExternals
            )
        )
        .map((token) => `${fileName}: ${token}`)
    )
  );
};
