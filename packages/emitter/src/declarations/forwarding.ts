/**
 * Runtime forwarding calls
 *
 * Every wrapper member body is a single call into Il2CppRuntime, keyed
 * either by the original member name or by native address.
 */

import {
  identifier,
  invocation,
  literal,
  memberPath,
  stringLiteral,
  thisExpression,
  typeFromText,
  type CSharpExpressionAst,
} from "../core/format/backend-ast/index.js";

export const RUNTIME_CLASS = "Il2CppRuntime";

/** Root class of every wrapper without a usable base */
export const ROOT_BASE_TYPE = "Il2CppObject";

export type ForwardTarget =
  | { readonly kind: "name"; readonly name: string }
  | { readonly kind: "address"; readonly address: string };

/**
 * Original IL2CPP location of the declaring class.
 */
export type ClassLookup = {
  readonly namespace: string;
  readonly className: string;
};

export type ForwardCall = {
  readonly lookup: ClassLookup;
  readonly target: ForwardTarget;
  readonly isStatic: boolean;
  /** Qualified C# return type; undefined for void */
  readonly returnType?: string;
  readonly parameterTypes: readonly string[];
  readonly argumentNames: readonly string[];
};

const runtime = (
  method: string,
  args: readonly CSharpExpressionAst[],
  typeArgument?: string
): CSharpExpressionAst =>
  invocation(
    memberPath(`${RUNTIME_CLASS}.${method}`),
    args,
    typeArgument !== undefined ? [typeFromText(typeArgument)] : undefined
  );

/**
 * `global::System.Type.EmptyTypes` or
 * `new global::System.Type[] { typeof(A), typeof(B) }`.
 */
export const parameterTypeArray = (
  parameterTypes: readonly string[]
): CSharpExpressionAst =>
  parameterTypes.length === 0
    ? memberPath("global::System.Type.EmptyTypes")
    : {
        kind: "arrayCreationExpression",
        elementType: typeFromText("global::System.Type"),
        initializer: parameterTypes.map((type): CSharpExpressionAst => ({
          kind: "typeofExpression",
          type: typeFromText(type),
        })),
      };

const methodName = (call: ForwardCall): string => {
  const byAddress = call.target.kind === "address" ? "ByRva" : "";
  if (call.returnType === undefined) {
    return `${call.isStatic ? "InvokeStaticVoid" : "InvokeVoid"}${byAddress}`;
  }
  return `${call.isStatic ? "CallStatic" : "Call"}${byAddress}`;
};

const receiverArguments = (call: ForwardCall): CSharpExpressionAst[] => {
  const { target, lookup } = call;
  if (target.kind === "address") {
    const address = literal(target.address);
    return call.isStatic ? [address] : [thisExpression, address];
  }
  const name = stringLiteral(target.name);
  return call.isStatic
    ? [stringLiteral(lookup.namespace), stringLiteral(lookup.className), name]
    : [thisExpression, name];
};

export const forwardCall = (call: ForwardCall): CSharpExpressionAst =>
  runtime(
    methodName(call),
    [
      ...receiverArguments(call),
      parameterTypeArray(call.parameterTypes),
      ...call.argumentNames.map(identifier),
    ],
    call.returnType
  );

export const getFieldCall = (
  type: string,
  fieldName: string
): CSharpExpressionAst =>
  runtime("GetField", [thisExpression, stringLiteral(fieldName)], type);

export const setFieldCall = (
  type: string,
  fieldName: string
): CSharpExpressionAst =>
  runtime(
    "SetField",
    [thisExpression, stringLiteral(fieldName), identifier("value")],
    type
  );
