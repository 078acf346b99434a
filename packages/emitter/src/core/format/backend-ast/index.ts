export type {
  CSharpTypeAst,
  CSharpExpressionAst,
  CSharpStatementAst,
  CSharpBlockStatementAst,
  CSharpParameterAst,
  CSharpMemberAst,
  CSharpFieldDeclarationAst,
  CSharpPropertyDeclarationAst,
  CSharpMethodDeclarationAst,
  CSharpConstructorDeclarationAst,
  CSharpTypeDeclarationAst,
  CSharpClassDeclarationAst,
  CSharpStructDeclarationAst,
  CSharpInterfaceDeclarationAst,
  CSharpEnumDeclarationAst,
  CSharpEnumMemberAst,
  CSharpDelegateDeclarationAst,
  CSharpNamespaceDeclarationAst,
  CSharpCompilationUnitAst,
  CSharpUsingDirectiveAst,
} from "./types.js";
export {
  typeFromText,
  stringLiteral,
  literal,
  identifier,
  thisExpression,
  memberPath,
  invocation,
  blankLine,
  commentLine,
  separatedGroups,
} from "./builders.js";
export {
  printType,
  printExpression,
  printStatement,
  printMember,
  printTypeDeclaration,
  printCompilationUnit,
} from "./printer.js";
