import {
  friendlyName,
  hasValidIdentifierChars,
  isGenericTypeName,
  isPublic,
  type Decision,
  exclude,
  ADMITTED,
  type TypeDeclaration,
} from "@wrapgen/frontend";
import type { NamespaceScope } from "./scope.js";

export type DisplayName = {
  readonly name: string;
  readonly docSummary?: string;
};

/**
 * Friendly name when the mapping has one, the IL2CPP name otherwise.
 */
export const mappedTypeName = (
  scope: NamespaceScope,
  decl: TypeDeclaration,
  kindLabel: string
): DisplayName => {
  const friendly = friendlyName(scope.registry.mappings, decl.name);
  return friendly === undefined
    ? { name: decl.name }
    : {
        name: friendly,
        docSummary: `Deobfuscated ${kindLabel}. IL2CPP name: '${decl.name}'`,
      };
};

/**
 * Gate shared by delegates and interfaces, which the registry does not
 * admit on content.
 */
export const plainTypeGate = (
  scope: NamespaceScope,
  decl: TypeDeclaration
): Decision => {
  if (!isPublic(decl)) {
    return exclude("notPublic");
  }
  if (isGenericTypeName(decl.name)) {
    return exclude("genericName");
  }
  if (!hasValidIdentifierChars(decl.name)) {
    return exclude("unrepresentableName");
  }
  return scope.registry.config.skipTypes.has(decl.name)
    ? exclude("skippedType")
    : ADMITTED;
};
