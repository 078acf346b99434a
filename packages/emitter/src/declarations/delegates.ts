/**
 * Delegate emission
 *
 * IL2CPP dumps delegates as classes deriving from MulticastDelegate with
 * an Invoke method carrying the signature.
 */

import type { TypeDeclaration } from "@wrapgen/frontend";
import {
  typeFromText,
  type CSharpDelegateDeclarationAst,
  type CSharpParameterAst,
} from "../core/format/backend-ast/index.js";
import { sanitizeIdentifier } from "../naming.js";
import { validateMethod } from "../validation.js";
import { type NamespaceScope, writableType } from "./scope.js";
import { mappedTypeName, plainTypeGate } from "./type-names.js";

export const emitDelegate = (
  scope: NamespaceScope,
  decl: TypeDeclaration
): CSharpDelegateDeclarationAst | undefined => {
  const gate = plainTypeGate(scope, decl);
  if (!gate.admitted) {
    scope.record(decl.name, gate.reason);
    return undefined;
  }

  const invoke = decl.methods.find((m) => m.name === "Invoke");
  if (invoke === undefined) {
    scope.record(decl.name, "noInvokeMethod");
    return undefined;
  }
  const validity = validateMethod(scope.registry, invoke);
  if (!validity.admitted) {
    scope.record(decl.name, validity.reason, invoke.name);
    return undefined;
  }

  const returnType = writableType(scope, invoke.returnType);
  const parameterTypes = invoke.parameters.map((p) =>
    writableType(scope, p.type)
  );
  if (!returnType.ok) {
    throw new Error(`ICE: Invoke of '${decl.name}' validated but not writable`);
  }

  const parameters: CSharpParameterAst[] = [];
  for (const [index, parameter] of invoke.parameters.entries()) {
    const type = parameterTypes[index];
    if (type === undefined || !type.ok) {
      throw new Error(
        `ICE: Invoke parameter '${parameter.name}' of '${decl.name}' validated but not writable`
      );
    }
    parameters.push({
      name: sanitizeIdentifier(parameter.name) ?? `arg${index}`,
      type: typeFromText(type.value),
    });
  }

  const { name, docSummary } = mappedTypeName(scope, decl, "delegate");
  if (!scope.claimTypeName(decl, name)) {
    scope.record(decl.name, "duplicateTypeName");
    return undefined;
  }

  return {
    kind: "delegateDeclaration",
    ...(docSummary !== undefined ? { docSummary } : {}),
    modifiers: ["public"],
    returnType: typeFromText(returnType.value),
    name,
    parameters,
  };
};
