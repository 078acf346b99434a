/**
 * Class member emission
 *
 * Fields become properties over Il2CppRuntime.GetField/SetField, matched
 * get_X/set_X pairs become properties, and the remaining public methods
 * become forwarding methods. Each section is emitted in that order so
 * later sections can see the names earlier ones took.
 */

import {
  type ExclusionReason,
  type FieldDeclaration,
  friendlyMemberName,
  isGenericTypeParameter,
  isPublic,
  isUnicodeName,
  type MethodDeclaration,
  type TypeDeclaration,
} from "@wrapgen/frontend";
import {
  blankLine,
  commentLine,
  typeFromText,
  type CSharpMemberAst,
  type CSharpMethodDeclarationAst,
  type CSharpParameterAst,
  type CSharpPropertyDeclarationAst,
  type CSharpStatementAst,
} from "../core/format/backend-ast/index.js";
import {
  addressPlaceholder,
  createPlaceholderNames,
  type PlaceholderNames,
  sanitizeIdentifier,
} from "../naming.js";
import { validateMethod } from "../validation.js";
import {
  type ClassLookup,
  forwardCall,
  type ForwardTarget,
  getFieldCall,
  setFieldCall,
} from "./forwarding.js";
import { type NamespaceScope, writableType } from "./scope.js";

export type ClassContext = {
  readonly scope: NamespaceScope;
  readonly decl: TypeDeclaration;
  /** Emitted class name */
  readonly className: string;
  readonly lookup: ClassLookup;
  readonly placeholders: PlaceholderNames;
  /** Field and property names taken so far */
  readonly memberNames: Set<string>;
};

export const createClassContext = (
  scope: NamespaceScope,
  decl: TypeDeclaration,
  className: string
): ClassContext => ({
  scope,
  decl,
  className,
  lookup: { namespace: scope.lookupNamespace, className: decl.name },
  placeholders: createPlaceholderNames(),
  memberNames: new Set(),
});

const record = (
  ctx: ClassContext,
  reason: ExclusionReason,
  memberName: string
): void => ctx.scope.record(ctx.decl.name, reason, memberName);

/**
 * Claim a member name, or record the conflict and return false.
 */
const claimMemberName = (
  ctx: ClassContext,
  name: string,
  originalName: string
): boolean => {
  if (name === ctx.className || ctx.memberNames.has(name)) {
    record(ctx, "memberNameConflict", originalName);
    return false;
  }
  ctx.memberNames.add(name);
  return true;
};

const section = (
  title: string,
  members: readonly CSharpMemberAst[]
): readonly CSharpMemberAst[] =>
  members.length === 0
    ? []
    : [
        commentLine(title),
        ...members.flatMap((member, index) =>
          index === 0 ? [member] : [blankLine(), member]
        ),
      ];

const isVoidType = (typeText: string): boolean =>
  typeText === "void" || typeText === "Void";

const modifiersFor = (visibility: string, isStatic: boolean): string[] =>
  isStatic ? [visibility, "static"] : [visibility];

// ============================================================
// Fields
// ============================================================

type NamedMember = {
  readonly name: string;
  readonly docSummary?: string;
};

const fieldAccess = (
  ctx: ClassContext,
  field: FieldDeclaration,
  friendly: string | undefined
): ExclusionReason | undefined => {
  if (field.isConst) {
    return "constField";
  }
  if (isGenericTypeParameter(field.type, ctx.scope.registry.config)) {
    return "genericParameter";
  }
  if (field.visibility === "public" || field.visibility === "protected") {
    return undefined;
  }
  return field.visibility === "private" && friendly !== undefined
    ? undefined
    : "inaccessibleField";
};

const fieldName = (
  ctx: ClassContext,
  field: FieldDeclaration,
  friendly: string | undefined
): NamedMember | undefined => {
  if (friendly !== undefined) {
    return {
      name: friendly,
      docSummary: `Deobfuscated field. IL2CPP name: '${field.name}'`,
    };
  }
  if (isUnicodeName(field.name)) {
    return {
      name: ctx.placeholders.next("field"),
      docSummary: `Obfuscated field. Original name: '${field.name}'`,
    };
  }
  const sanitized = sanitizeIdentifier(field.name);
  return sanitized === undefined ? undefined : { name: sanitized };
};

const emitField = (
  ctx: ClassContext,
  field: FieldDeclaration
): CSharpPropertyDeclarationAst | undefined => {
  const { registry } = ctx.scope;
  const friendly = friendlyMemberName(
    registry.mappings,
    ctx.decl.name,
    field.name
  );

  const denied = fieldAccess(ctx, field, friendly);
  if (denied !== undefined) {
    record(ctx, denied, field.name);
    return undefined;
  }
  const type = writableType(ctx.scope, field.type);
  if (!type.ok) {
    record(ctx, type.error, field.name);
    return undefined;
  }
  const named = fieldName(ctx, field, friendly);
  if (named === undefined) {
    record(ctx, "unrepresentableName", field.name);
    return undefined;
  }
  if (!claimMemberName(ctx, named.name, field.name)) {
    return undefined;
  }

  return {
    kind: "propertyDeclaration",
    ...(named.docSummary !== undefined ? { docSummary: named.docSummary } : {}),
    modifiers: ["public"],
    type: typeFromText(type.value),
    name: named.name,
    getter: getFieldCall(type.value, field.name),
    setter: setFieldCall(type.value, field.name),
  };
};

export const emitFields = (ctx: ClassContext): readonly CSharpMemberAst[] =>
  section(
    "Fields",
    ctx.decl.fields.flatMap((field) => {
      const emitted = emitField(ctx, field);
      return emitted === undefined ? [] : [emitted];
    })
  );

// ============================================================
// Properties
// ============================================================

type AccessorPair = {
  getter?: MethodDeclaration;
  setter?: MethodDeclaration;
  /** Dump type text: the getter's return type, else the setter's parameter */
  type: string;
};

const GETTER_PREFIX = "get_";
const SETTER_PREFIX = "set_";

const isGetter = (method: MethodDeclaration): boolean =>
  method.name.startsWith(GETTER_PREFIX) &&
  method.parameters.length === 0 &&
  !isVoidType(method.returnType);

const isSetter = (method: MethodDeclaration): boolean =>
  method.name.startsWith(SETTER_PREFIX) &&
  method.parameters.length === 1 &&
  isVoidType(method.returnType);

/**
 * Valid accessor-shaped methods keyed by property name.
 */
const collectAccessorPairs = (
  ctx: ClassContext
): ReadonlyMap<string, AccessorPair> => {
  const pairs = new Map<string, AccessorPair>();
  for (const method of ctx.decl.methods) {
    const getter = isGetter(method);
    if (!getter && !isSetter(method)) {
      continue;
    }
    if (!validateMethod(ctx.scope.registry, method).admitted) {
      continue;
    }
    const propertyName = method.name.slice(GETTER_PREFIX.length);
    if (getter) {
      const pair = pairs.get(propertyName);
      if (pair === undefined) {
        pairs.set(propertyName, { getter: method, type: method.returnType });
      } else {
        pair.getter = method;
        pair.type = method.returnType;
      }
    } else {
      const [parameter] = method.parameters;
      const pair = pairs.get(propertyName);
      if (pair === undefined) {
        pairs.set(propertyName, {
          setter: method,
          type: parameter?.type ?? "",
        });
      } else {
        pair.setter = method;
      }
    }
  }
  return pairs;
};

const propertyDisplayName = (
  ctx: ClassContext,
  name: string,
  friendly: string | undefined
): NamedMember | undefined => {
  if (friendly !== undefined) {
    return {
      name: friendly,
      docSummary: `Deobfuscated property. IL2CPP name: '${name}'`,
    };
  }
  if (isUnicodeName(name)) {
    return {
      name: ctx.placeholders.next("property"),
      docSummary: `Obfuscated property. Original name: '${name}'`,
    };
  }
  const sanitized = sanitizeIdentifier(name);
  return sanitized === undefined ? undefined : { name: sanitized };
};

const accessorTarget = (
  accessor: MethodDeclaration,
  byAddress: boolean
): ForwardTarget =>
  byAddress && accessor.nativeAddress !== undefined
    ? { kind: "address", address: accessor.nativeAddress }
    : { kind: "name", name: accessor.name };

const emitProperty = (
  ctx: ClassContext,
  name: string,
  pair: AccessorPair
): CSharpPropertyDeclarationAst | undefined => {
  const { registry } = ctx.scope;
  if (registry.config.skipPropertyNames.has(name)) {
    record(ctx, "skippedPropertyName", name);
    return undefined;
  }
  const type = writableType(ctx.scope, pair.type);
  if (!type.ok) {
    record(ctx, type.error, name);
    return undefined;
  }
  const friendly = friendlyMemberName(registry.mappings, ctx.decl.name, name);
  const named = propertyDisplayName(ctx, name, friendly);
  if (named === undefined) {
    record(ctx, "unrepresentableName", name);
    return undefined;
  }
  if (!claimMemberName(ctx, named.name, name)) {
    return undefined;
  }

  const { getter, setter } = pair;
  const visibility = getter?.visibility ?? setter?.visibility ?? "public";
  const isStatic = (getter?.isStatic ?? false) || (setter?.isStatic ?? false);
  const byAddress = isUnicodeName(name);

  return {
    kind: "propertyDeclaration",
    ...(named.docSummary !== undefined ? { docSummary: named.docSummary } : {}),
    modifiers: modifiersFor(visibility, isStatic),
    type: typeFromText(type.value),
    name: named.name,
    ...(getter !== undefined
      ? {
          getter: forwardCall({
            lookup: ctx.lookup,
            target: accessorTarget(getter, byAddress),
            isStatic,
            returnType: type.value,
            parameterTypes: [],
            argumentNames: [],
          }),
        }
      : {}),
    ...(setter !== undefined
      ? {
          setter: forwardCall({
            lookup: ctx.lookup,
            target: accessorTarget(setter, byAddress),
            isStatic,
            parameterTypes: [type.value],
            argumentNames: ["value"],
          }),
        }
      : {}),
  };
};

export type PropertySection = {
  readonly members: readonly CSharpMemberAst[];
  /** Accessor methods now represented by a property */
  readonly consumed: ReadonlySet<MethodDeclaration>;
};

/**
 * Consolidate get_X/set_X pairs, in property name order. Pairs that
 * cannot become a property leave their accessors to the method section.
 */
export const emitProperties = (ctx: ClassContext): PropertySection => {
  const pairs = collectAccessorPairs(ctx);
  const consumed = new Set<MethodDeclaration>();
  const properties: CSharpMemberAst[] = [];

  for (const name of [...pairs.keys()].sort()) {
    const pair = pairs.get(name);
    if (pair === undefined) {
      continue;
    }
    const property = emitProperty(ctx, name, pair);
    if (property === undefined) {
      continue;
    }
    properties.push(property);
    if (pair.getter !== undefined) {
      consumed.add(pair.getter);
    }
    if (pair.setter !== undefined) {
      consumed.add(pair.setter);
    }
  }

  return { members: section("Properties", properties), consumed };
};

// ============================================================
// Methods
// ============================================================

type MethodKey = {
  readonly key: string;
  readonly byAddress: boolean;
};

/**
 * Sanitized name, or the address placeholder for obfuscated names.
 */
const methodKey = (
  ctx: ClassContext,
  method: MethodDeclaration
): MethodKey | undefined => {
  if (isUnicodeName(method.name)) {
    if (method.nativeAddress === undefined) {
      record(ctx, "noNativeAddress", method.name);
      return undefined;
    }
    return { key: addressPlaceholder(method.nativeAddress), byAddress: true };
  }
  const sanitized = sanitizeIdentifier(method.name);
  if (sanitized === undefined) {
    record(ctx, "unrepresentableName", method.name);
    return undefined;
  }
  return { key: sanitized, byAddress: false };
};

const writable = (ctx: ClassContext, typeText: string): string => {
  const type = writableType(ctx.scope, typeText);
  if (!type.ok) {
    throw new Error(
      `ICE: Type '${typeText}' in '${ctx.decl.name}' validated but not writable (${type.error})`
    );
  }
  return type.value;
};

const methodDocSummary = (
  method: MethodDeclaration,
  friendly: string | undefined,
  byAddress: boolean
): string | undefined => {
  if (friendly !== undefined) {
    return `Deobfuscated method. IL2CPP name: '${method.name}'`;
  }
  return byAddress
    ? `Obfuscated method. Original name: '${method.name}', RVA: ${method.nativeAddress ?? ""}`
    : undefined;
};

const emitMethod = (
  ctx: ClassContext,
  method: MethodDeclaration,
  name: string,
  friendly: string | undefined,
  byAddress: boolean
): CSharpMethodDeclarationAst => {
  const returnType = writable(ctx, method.returnType);
  const isVoid = returnType === "void";
  const parameterTypes = method.parameters.map((p) => writable(ctx, p.type));
  const parameters: CSharpParameterAst[] = method.parameters.map(
    (parameter, index) => ({
      name: sanitizeIdentifier(parameter.name) ?? `arg${index}`,
      type: typeFromText(parameterTypes[index] ?? ""),
    })
  );

  const target: ForwardTarget =
    byAddress && method.nativeAddress !== undefined
      ? { kind: "address", address: method.nativeAddress }
      : { kind: "name", name: method.name };
  const call = forwardCall({
    lookup: ctx.lookup,
    target,
    isStatic: method.isStatic,
    ...(isVoid ? {} : { returnType }),
    parameterTypes,
    argumentNames: parameters.map((p) => p.name),
  });
  const statement: CSharpStatementAst = isVoid
    ? { kind: "expressionStatement", expression: call }
    : { kind: "returnStatement", expression: call };

  const docSummary = methodDocSummary(method, friendly, byAddress);
  return {
    kind: "methodDeclaration",
    ...(docSummary !== undefined ? { docSummary } : {}),
    modifiers: modifiersFor("public", method.isStatic),
    returnType: typeFromText(returnType),
    name,
    parameters,
    body: { kind: "blockStatement", statements: [statement] },
  };
};

/**
 * Public valid methods not consumed by a property, de-duplicated by key
 * and mapped parameter types. The first overload with a signature wins.
 */
export const emitMethods = (
  ctx: ClassContext,
  consumed: ReadonlySet<MethodDeclaration>
): readonly CSharpMemberAst[] => {
  const { registry } = ctx.scope;
  const signatures = new Set<string>();
  const methods: CSharpMemberAst[] = [];

  for (const method of ctx.decl.methods) {
    if (consumed.has(method)) {
      continue;
    }
    if (!isPublic(method)) {
      record(ctx, "notPublic", method.name);
      continue;
    }
    const validity = validateMethod(registry, method);
    if (!validity.admitted) {
      record(ctx, validity.reason, method.name);
      continue;
    }
    const keyed = methodKey(ctx, method);
    if (keyed === undefined) {
      continue;
    }

    const signature = `${keyed.key}(${method.parameters
      .map((p) => writable(ctx, p.type))
      .join(", ")})`;
    if (signatures.has(signature)) {
      record(ctx, "duplicateSignature", method.name);
      continue;
    }
    signatures.add(signature);

    const friendly = friendlyMemberName(
      registry.mappings,
      ctx.decl.name,
      method.name
    );
    const name = friendly ?? keyed.key;
    if (name === ctx.className || ctx.memberNames.has(name)) {
      record(ctx, "memberNameConflict", method.name);
      continue;
    }

    const byAddress = keyed.byAddress && friendly === undefined;
    methods.push(emitMethod(ctx, method, name, friendly, byAddress));
  }

  return section("Methods", methods);
};
