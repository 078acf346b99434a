/**
 * Backend C# AST type definitions
 *
 * Structured nodes for deterministic wrapper generation. Only the
 * constructs a forwarding wrapper needs are modelled.
 *
 * Pipeline: declarations -> typed CSharpAst -> deterministic printer -> C# text
 *
 * INVARIANT: No raw code fragments. Comments are the only free text, and the
 * printer adds their markers itself.
 */

// ============================================================
// Type AST
// ============================================================

export type CSharpPredefinedTypeAst = {
  readonly kind: "predefinedType";
  /** C# keyword: "int", "string", "bool", "void", "object", ... */
  readonly keyword: string;
};

export type CSharpIdentifierTypeAst = {
  readonly kind: "identifierType";
  /** Type name, possibly fully qualified (e.g. "global::UnityEngine.Object") */
  readonly name: string;
  readonly typeArguments?: readonly CSharpTypeAst[];
};

export type CSharpNullableTypeAst = {
  readonly kind: "nullableType";
  readonly underlyingType: CSharpTypeAst;
};

export type CSharpArrayTypeAst = {
  readonly kind: "arrayType";
  readonly elementType: CSharpTypeAst;
  /** Array rank: 1 for T[], 2 for T[,], etc. */
  readonly rank: number;
};

export type CSharpTypeAst =
  | CSharpPredefinedTypeAst
  | CSharpIdentifierTypeAst
  | CSharpNullableTypeAst
  | CSharpArrayTypeAst;

// ============================================================
// Expression AST
// ============================================================

export type CSharpLiteralExpressionAst = {
  readonly kind: "literalExpression";
  /** Token text as written: "null", "42", "0x1A2B", `"hello"` */
  readonly text: string;
};

export type CSharpIdentifierExpressionAst = {
  readonly kind: "identifierExpression";
  readonly identifier: string;
};

export type CSharpThisExpressionAst = {
  readonly kind: "thisExpression";
};

export type CSharpMemberAccessExpressionAst = {
  readonly kind: "memberAccessExpression";
  readonly expression: CSharpExpressionAst;
  readonly memberName: string;
};

export type CSharpInvocationExpressionAst = {
  readonly kind: "invocationExpression";
  readonly expression: CSharpExpressionAst;
  readonly arguments: readonly CSharpExpressionAst[];
  readonly typeArguments?: readonly CSharpTypeAst[];
};

export type CSharpTypeofExpressionAst = {
  readonly kind: "typeofExpression";
  readonly type: CSharpTypeAst;
};

export type CSharpArrayCreationExpressionAst = {
  readonly kind: "arrayCreationExpression";
  readonly elementType: CSharpTypeAst;
  readonly initializer: readonly CSharpExpressionAst[];
};

export type CSharpExpressionAst =
  | CSharpLiteralExpressionAst
  | CSharpIdentifierExpressionAst
  | CSharpThisExpressionAst
  | CSharpMemberAccessExpressionAst
  | CSharpInvocationExpressionAst
  | CSharpTypeofExpressionAst
  | CSharpArrayCreationExpressionAst;

// ============================================================
// Statement AST
// ============================================================

export type CSharpBlockStatementAst = {
  readonly kind: "blockStatement";
  readonly statements: readonly CSharpStatementAst[];
};

export type CSharpExpressionStatementAst = {
  readonly kind: "expressionStatement";
  readonly expression: CSharpExpressionAst;
};

export type CSharpReturnStatementAst = {
  readonly kind: "returnStatement";
  readonly expression?: CSharpExpressionAst;
};

export type CSharpStatementAst =
  | CSharpBlockStatementAst
  | CSharpExpressionStatementAst
  | CSharpReturnStatementAst;

// ============================================================
// Member AST
// ============================================================

export type CSharpParameterAst = {
  readonly name: string;
  readonly type: CSharpTypeAst;
};

/** A `// text` line between members */
export type CSharpCommentLineAst = {
  readonly kind: "commentLine";
  readonly text: string;
};

export type CSharpBlankLineAst = {
  readonly kind: "blankLine";
};

export type CSharpFieldDeclarationAst = {
  readonly kind: "fieldDeclaration";
  readonly docSummary?: string;
  readonly modifiers: readonly string[];
  readonly type: CSharpTypeAst;
  readonly name: string;
  readonly initializer?: CSharpExpressionAst;
};

/**
 * Property with expression-bodied accessors. An accessor that is absent
 * is not printed.
 */
export type CSharpPropertyDeclarationAst = {
  readonly kind: "propertyDeclaration";
  readonly docSummary?: string;
  readonly modifiers: readonly string[];
  readonly type: CSharpTypeAst;
  readonly name: string;
  readonly getter?: CSharpExpressionAst;
  readonly setter?: CSharpExpressionAst;
};

export type CSharpMethodDeclarationAst = {
  readonly kind: "methodDeclaration";
  readonly docSummary?: string;
  readonly modifiers: readonly string[];
  readonly returnType: CSharpTypeAst;
  readonly name: string;
  readonly parameters: readonly CSharpParameterAst[];
  readonly body: CSharpBlockStatementAst;
};

export type CSharpConstructorDeclarationAst = {
  readonly kind: "constructorDeclaration";
  readonly modifiers: readonly string[];
  readonly name: string;
  readonly parameters: readonly CSharpParameterAst[];
  /** Arguments of the `: base(...)` initializer, when present */
  readonly baseArguments?: readonly CSharpExpressionAst[];
  readonly body: CSharpBlockStatementAst;
};

export type CSharpMemberAst =
  | CSharpCommentLineAst
  | CSharpBlankLineAst
  | CSharpFieldDeclarationAst
  | CSharpPropertyDeclarationAst
  | CSharpMethodDeclarationAst
  | CSharpConstructorDeclarationAst;

// ============================================================
// Type declaration AST
// ============================================================

export type CSharpClassDeclarationAst = {
  readonly kind: "classDeclaration";
  readonly docSummary?: string;
  readonly modifiers: readonly string[];
  readonly name: string;
  readonly baseType?: CSharpTypeAst;
  readonly members: readonly CSharpMemberAst[];
};

export type CSharpStructDeclarationAst = {
  readonly kind: "structDeclaration";
  readonly docSummary?: string;
  readonly modifiers: readonly string[];
  readonly name: string;
  readonly members: readonly CSharpMemberAst[];
};

export type CSharpInterfaceDeclarationAst = {
  readonly kind: "interfaceDeclaration";
  readonly docSummary?: string;
  readonly modifiers: readonly string[];
  readonly name: string;
  readonly members: readonly CSharpMemberAst[];
};

export type CSharpEnumMemberAst = {
  readonly name: string;
  readonly value?: CSharpExpressionAst;
};

export type CSharpEnumDeclarationAst = {
  readonly kind: "enumDeclaration";
  readonly docSummary?: string;
  readonly modifiers: readonly string[];
  readonly name: string;
  readonly members: readonly CSharpEnumMemberAst[];
};

export type CSharpDelegateDeclarationAst = {
  readonly kind: "delegateDeclaration";
  readonly docSummary?: string;
  readonly modifiers: readonly string[];
  readonly returnType: CSharpTypeAst;
  readonly name: string;
  readonly parameters: readonly CSharpParameterAst[];
};

export type CSharpTypeDeclarationAst =
  | CSharpClassDeclarationAst
  | CSharpStructDeclarationAst
  | CSharpInterfaceDeclarationAst
  | CSharpEnumDeclarationAst
  | CSharpDelegateDeclarationAst;

// ============================================================
// Top-level compilation unit
// ============================================================

export type CSharpUsingDirectiveAst = {
  readonly kind: "usingDirective";
  readonly namespace: string;
};

export type CSharpNamespaceDeclarationAst = {
  readonly kind: "namespaceDeclaration";
  /** `// text` lines printed above the namespace keyword */
  readonly leadingComments: readonly string[];
  readonly name: string;
  readonly members: readonly CSharpTypeDeclarationAst[];
};

export type CSharpCompilationUnitAst = {
  readonly kind: "compilationUnit";
  /** `// text` lines at the top of the file */
  readonly headerComments: readonly string[];
  readonly usings: readonly CSharpUsingDirectiveAst[];
  readonly members: readonly CSharpNamespaceDeclarationAst[];
};
