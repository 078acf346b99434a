/**
 * Content eligibility
 *
 * Decides whether an admitted declaration will produce output. The
 * emitter applies the same rules when it writes a namespace, so every
 * type in the generated set has a body to show for it.
 */

import type { GeneratorConfig } from "../config/generator-config.js";
import {
  hasValidIdentifierChars,
  isRepresentableName,
} from "../names/identifiers.js";
import { isGenericTypeParameter } from "../names/generic-parameters.js";
import { trimBaseType } from "../names/type-text.js";
import {
  ADMITTED,
  type Decision,
  exclude,
  firstExclusion,
} from "../types/decision.js";
import type { TypeDeclaration } from "../types/declarations.js";

export const DELEGATE_BASE_TYPE = "MulticastDelegate";

const INT32_MIN = -2147483648n;
const INT32_MAX = 2147483647n;
const INTEGER_LITERAL = /^[+-]?\d+$/;

export type EnumConstant = {
  readonly name: string;
  /** Literal text with any trailing comment removed */
  readonly value?: string;
};

/**
 * Integer literals must fit a signed 32-bit enum; other literal forms
 * are passed through.
 */
export const isEmittableEnumValue = (value: string): boolean => {
  if (!INTEGER_LITERAL.test(value)) {
    return true;
  }
  const parsed = BigInt(value);
  return parsed >= INT32_MIN && parsed <= INT32_MAX;
};

/**
 * Constants of an enum in declaration order, minus names no identifier
 * can carry and values no int enum can hold.
 */
export const emittableEnumConstants = (
  decl: TypeDeclaration
): readonly EnumConstant[] =>
  decl.fields.flatMap((field): EnumConstant[] => {
    if (
      !field.isConst ||
      field.type !== decl.name ||
      !isRepresentableName(field.name)
    ) {
      return [];
    }
    if (field.literalValue === undefined) {
      return [{ name: field.name }];
    }
    const value = (field.literalValue.split("//")[0] ?? "").trim();
    return isEmittableEnumValue(value) ? [{ name: field.name, value }] : [];
  });

export const isDelegateDeclaration = (decl: TypeDeclaration): boolean =>
  decl.kind === "class" &&
  decl.baseType !== undefined &&
  trimBaseType(decl.baseType) === DELEGATE_BASE_TYPE;

export type DeclarationGroup =
  | "delegate"
  | "enum"
  | "interface"
  | "struct"
  | "class";

/**
 * Order in which a namespace block writes its declarations. The first
 * declaration in this order keeps a contested type name.
 */
export const EMISSION_ORDER: readonly DeclarationGroup[] = [
  "delegate",
  "enum",
  "interface",
  "struct",
  "class",
];

export const declarationGroup = (decl: TypeDeclaration): DeclarationGroup =>
  isDelegateDeclaration(decl) ? "delegate" : decl.kind;

export const hasGenericPublicField = (
  decl: TypeDeclaration,
  config: GeneratorConfig
): boolean =>
  decl.fields.some(
    (field) =>
      field.visibility === "public" &&
      !field.isConst &&
      isGenericTypeParameter(field.type, config)
  );

export const isGenericTypeName = (name: string): boolean =>
  name.includes("`") || name.includes("<") || name.includes(">");

export type EligibilityContext = {
  readonly config: GeneratorConfig;
  readonly sealedTypes: ReadonlySet<string>;
};

const hasMembers = (decl: TypeDeclaration): boolean =>
  decl.fields.length > 0 ||
  decl.properties.length > 0 ||
  decl.methods.length > 0;

export const evaluateContent = (
  decl: TypeDeclaration,
  ctx: EligibilityContext
): Decision => {
  const { config } = ctx;
  const base =
    decl.baseType !== undefined ? trimBaseType(decl.baseType) : undefined;

  return firstExclusion([
    () => (isGenericTypeName(decl.name) ? exclude("genericName") : ADMITTED),
    () =>
      hasValidIdentifierChars(decl.name)
        ? ADMITTED
        : exclude("unrepresentableName"),
    () => (config.skipTypes.has(decl.name) ? exclude("skippedType") : ADMITTED),
    () => (base === DELEGATE_BASE_TYPE ? exclude("delegateBase") : ADMITTED),
    () =>
      base !== undefined && ctx.sealedTypes.has(base)
        ? exclude("sealedBase")
        : ADMITTED,
    () => {
      if (decl.kind === "enum") {
        if (emittableEnumConstants(decl).length === 0) {
          return exclude("emptyEnum");
        }
        return config.nestedEnumNames.has(decl.name)
          ? exclude("nestedEnumName")
          : ADMITTED;
      }
      if (!hasMembers(decl)) {
        return exclude("noMembers");
      }
      if (base !== undefined && config.skipBaseTypes.has(base)) {
        return exclude("skippedBaseType");
      }
      if (decl.kind === "struct" && hasGenericPublicField(decl, config)) {
        return exclude("genericField");
      }
      return ADMITTED;
    },
  ]);
};
