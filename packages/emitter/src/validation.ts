/**
 * Member validation
 *
 * A member is only written when every type it mentions can be written
 * and resolves to something the output declares.
 */

import {
  ADMITTED,
  bareName,
  type Decision,
  exclude,
  firstExclusion,
  hasGenericTypeArgument,
  isGenericTypeParameter,
  isResolvable,
  isUnicodeName,
  mapType,
  type MethodDeclaration,
  NO_NAME_PARAMETER,
  type ParameterDeclaration,
  type TypeRegistry,
} from "@wrapgen/frontend";

const COMPILER_GENERATED = /[|<>]/;
const UPPERCASE_START = /^\p{Lu}/u;

/**
 * Check one type reference of a field, property, method or delegate.
 */
export const validateType = (
  registry: TypeRegistry,
  typeText: string
): Decision => {
  const { config } = registry;
  return firstExclusion([
    () =>
      isGenericTypeParameter(typeText, config)
        ? exclude("genericParameter")
        : ADMITTED,
    () =>
      hasGenericTypeArgument(typeText, config)
        ? exclude("genericArgument")
        : ADMITTED,
    () => (typeText.includes("*") ? exclude("pointerType") : ADMITTED),
    () =>
      isUnicodeName(bareName(typeText)) ? exclude("obfuscatedName") : ADMITTED,
    () => {
      if (mapType(registry, typeText) !== undefined) {
        return ADMITTED;
      }
      return typeText.includes("Nullable")
        ? exclude("nullableType")
        : exclude("emptyType");
    },
    () => isResolvable(registry, typeText),
  ]);
};

/**
 * "System.IDisposable.Dispose" style names.
 */
const isExplicitInterfaceName = (name: string): boolean => {
  const [first = ""] = name.split(".");
  return name.includes(".") && UPPERCASE_START.test(first);
};

const validateParameter = (
  registry: TypeRegistry,
  parameter: ParameterDeclaration
): Decision => {
  if (parameter.name === NO_NAME_PARAMETER) {
    return exclude("unnamedParameter");
  }
  if (parameter.modifier !== "none") {
    return exclude("byRefParameter");
  }
  return validateType(registry, parameter.type);
};

export const validateMethod = (
  registry: TypeRegistry,
  method: MethodDeclaration
): Decision =>
  firstExclusion([
    () =>
      method.name === ".ctor" || method.name === ".cctor"
        ? exclude("constructor")
        : ADMITTED,
    () =>
      COMPILER_GENERATED.test(method.name)
        ? exclude("compilerGenerated")
        : ADMITTED,
    () =>
      isExplicitInterfaceName(method.name)
        ? exclude("explicitInterface")
        : ADMITTED,
    () => validateType(registry, method.returnType),
    ...method.parameters.map(
      (parameter) => () => validateParameter(registry, parameter)
    ),
  ]);
