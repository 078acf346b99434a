/**
 * Class emission
 *
 * Every admitted class becomes `public partial class Name : Base` holding
 * a native-pointer constructor and forwarding members.
 */

import {
  ADMITTED,
  type Decision,
  exclude,
  friendlyName,
  isGenericTypeName,
  isObfuscatedName,
  isPublic,
  isResolvable,
  isUnicodeName,
  qualifyBaseType,
  trimBaseType,
  type TypeDeclaration,
} from "@wrapgen/frontend";
import {
  identifier,
  stringLiteral,
  typeFromText,
  separatedGroups,
  type CSharpClassDeclarationAst,
  type CSharpMemberAst,
} from "../core/format/backend-ast/index.js";
import { sanitizeIdentifier } from "../naming.js";
import {
  createClassContext,
  emitFields,
  emitMethods,
  emitProperties,
} from "./class-members.js";
import { ROOT_BASE_TYPE } from "./forwarding.js";
import type { NamespaceScope } from "./scope.js";
import type { DisplayName } from "./type-names.js";

const INTERFACE_NAME = /^I\p{Lu}/u;

const classGate = (scope: NamespaceScope, decl: TypeDeclaration): Decision => {
  const { config, sealedTypes } = scope.registry;
  if (!isPublic(decl)) {
    return exclude("notPublic");
  }
  if (isGenericTypeName(decl.name)) {
    return exclude("genericName");
  }
  const base =
    decl.baseType !== undefined ? trimBaseType(decl.baseType) : undefined;
  if (base !== undefined && config.skipBaseTypes.has(base)) {
    return exclude("skippedBaseType");
  }
  if (base !== undefined && sealedTypes.has(base)) {
    return exclude("sealedBase");
  }
  return config.skipTypes.has(decl.name) ? exclude("skippedType") : ADMITTED;
};

const className = (
  scope: NamespaceScope,
  decl: TypeDeclaration
): DisplayName | undefined => {
  const friendly = friendlyName(scope.registry.mappings, decl.name);
  if (friendly !== undefined) {
    return {
      name: friendly,
      docSummary: `Deobfuscated class. IL2CPP name: '${decl.name}'`,
    };
  }
  if (isUnicodeName(decl.name)) {
    return {
      name: scope.classPlaceholders.next("class"),
      docSummary: `Obfuscated class. Original name: '${decl.name}'`,
    };
  }
  const sanitized = sanitizeIdentifier(decl.name);
  if (sanitized === undefined) {
    return undefined;
  }
  return sanitized === decl.name
    ? { name: sanitized }
    : {
        name: sanitized,
        docSummary: `Renamed. Original IL2CPP name: '${decl.name}'`,
      };
};

/**
 * The C# base class: the declared base when it can be written, the
 * runtime root otherwise.
 */
export const resolveBaseType = (
  scope: NamespaceScope,
  decl: TypeDeclaration
): string => {
  const { registry } = scope;
  if (decl.baseType === undefined) {
    return ROOT_BASE_TYPE;
  }
  const base = trimBaseType(decl.baseType);
  if (
    base === "" ||
    base.includes("`") ||
    base.includes("<") ||
    INTERFACE_NAME.test(base)
  ) {
    return ROOT_BASE_TYPE;
  }

  const friendly = friendlyName(registry.mappings, base);
  if (friendly === undefined && isObfuscatedName(base)) {
    return ROOT_BASE_TYPE;
  }
  if (
    !isResolvable(registry, base).admitted &&
    !registry.config.knownBaseTypes.has(base)
  ) {
    return ROOT_BASE_TYPE;
  }
  return qualifyBaseType(registry, friendly ?? base, scope.namespace);
};

const lookupConstants = (
  scope: NamespaceScope,
  decl: TypeDeclaration
): readonly CSharpMemberAst[] => [
  {
    kind: "fieldDeclaration",
    docSummary: "Original IL2CPP class name for runtime lookups",
    modifiers: ["private", "const"],
    type: typeFromText("string"),
    name: "_il2cppClassName",
    initializer: stringLiteral(decl.name),
  },
  {
    kind: "fieldDeclaration",
    modifiers: ["private", "const"],
    type: typeFromText("string"),
    name: "_il2cppNamespace",
    initializer: stringLiteral(scope.lookupNamespace),
  },
];

export const emitClass = (
  scope: NamespaceScope,
  decl: TypeDeclaration
): CSharpClassDeclarationAst | undefined => {
  const gate = classGate(scope, decl);
  if (!gate.admitted) {
    scope.record(decl.name, gate.reason);
    return undefined;
  }

  const named = className(scope, decl);
  if (named === undefined) {
    scope.record(decl.name, "unrepresentableName");
    return undefined;
  }
  if (!scope.claimTypeName(decl, named.name)) {
    scope.record(decl.name, "duplicateTypeName");
    return undefined;
  }

  const ctx = createClassContext(scope, decl, named.name);
  const constructor: CSharpMemberAst = {
    kind: "constructorDeclaration",
    modifiers: ["public"],
    name: named.name,
    parameters: [{ name: "nativePtr", type: typeFromText("IntPtr") }],
    baseArguments: [identifier("nativePtr")],
    body: { kind: "blockStatement", statements: [] },
  };
  const fields = emitFields(ctx);
  const properties = emitProperties(ctx);
  const methods = emitMethods(ctx, properties.consumed);

  const needsLookup = named.name !== decl.name || scope.isSanitized;
  return {
    kind: "classDeclaration",
    ...(named.docSummary !== undefined ? { docSummary: named.docSummary } : {}),
    modifiers: ["public", "partial"],
    name: named.name,
    baseType: typeFromText(resolveBaseType(scope, decl)),
    members: separatedGroups([
      needsLookup ? lookupConstants(scope, decl) : [],
      [constructor],
      fields,
      properties.members,
      methods,
    ]),
  };
};
