/**
 * Declaration model produced by the dump parser
 *
 * One TypeDeclaration per parsed type block. Identity is (name, namespace);
 * the same name may repeat across namespaces. Declarations are never
 * mutated after parsing.
 */

export type TypeKind = "class" | "interface" | "enum" | "struct";

export type ParameterModifier = "none" | "out" | "ref" | "in";

/**
 * Name given to parameters the parser saw without a usable name.
 * Member validation rejects any method carrying one.
 */
export const NO_NAME_PARAMETER = "__no_name__";

/**
 * Namespace token used for declarations outside any namespace.
 */
export const GLOBAL_NAMESPACE = "Global";

export type ParameterDeclaration = {
  readonly modifier: ParameterModifier;
  readonly type: string;
  readonly name: string;
};

export type FieldDeclaration = {
  readonly name: string;
  readonly type: string;
  readonly visibility: string;
  readonly isConst: boolean;
  readonly literalValue?: string;
};

export type PropertyDeclaration = {
  readonly name: string;
  readonly type: string;
  readonly visibility: string;
  readonly hasGetter: boolean;
  readonly hasSetter: boolean;
};

export type MethodDeclaration = {
  readonly name: string;
  readonly returnType: string;
  readonly isStatic: boolean;
  readonly visibility: string;
  readonly parameters: readonly ParameterDeclaration[];
  /** RVA taken from the comment line preceding the method, e.g. "0x1A2B3C" */
  readonly nativeAddress?: string;
};

export type TypeDeclaration = {
  readonly library?: string;
  readonly namespace?: string;
  readonly kind: TypeKind;
  readonly name: string;
  readonly baseType?: string;
  readonly visibility: string;
  readonly isSealed: boolean;
  readonly isAbstract: boolean;
  readonly isStatic: boolean;
  readonly fields: readonly FieldDeclaration[];
  readonly properties: readonly PropertyDeclaration[];
  readonly methods: readonly MethodDeclaration[];
};

/**
 * Namespace a declaration is grouped and registered under.
 */
export const namespaceOf = (decl: TypeDeclaration): string =>
  decl.namespace ?? GLOBAL_NAMESPACE;

export const isPublic = (decl: { readonly visibility: string }): boolean =>
  decl.visibility === "public";
