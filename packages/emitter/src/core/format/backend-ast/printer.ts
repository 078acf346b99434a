/**
 * Backend AST Printer
 *
 * Converts typed C# AST nodes into deterministic C# source text.
 * Pure and stateless: four-space indentation, members in the order given,
 * keyword identifiers escaped with @.
 */

import {
  escapeCSharpIdentifier,
  escapeQualifiedName,
} from "../../../emitter-types/index.js";
import type {
  CSharpBlockStatementAst,
  CSharpCompilationUnitAst,
  CSharpEnumMemberAst,
  CSharpExpressionAst,
  CSharpMemberAst,
  CSharpNamespaceDeclarationAst,
  CSharpParameterAst,
  CSharpStatementAst,
  CSharpTypeAst,
  CSharpTypeDeclarationAst,
} from "./types.js";

const INDENT = "    ";

const escapeXmlText = (text: string): string =>
  text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");

const printDocSummary = (summary: string | undefined, indent: string): string =>
  summary === undefined
    ? ""
    : `${indent}/// <summary>${escapeXmlText(summary)}</summary>\n`;

const printModifiers = (modifiers: readonly string[]): string =>
  modifiers.length > 0 ? `${modifiers.join(" ")} ` : "";

// ============================================================
// Type Printer
// ============================================================

export const printType = (type: CSharpTypeAst): string => {
  switch (type.kind) {
    case "predefinedType":
      return type.keyword;

    case "identifierType": {
      const name = escapeQualifiedName(type.name);
      if (!type.typeArguments || type.typeArguments.length === 0) {
        return name;
      }
      return `${name}<${type.typeArguments.map(printType).join(", ")}>`;
    }

    case "nullableType":
      return `${printType(type.underlyingType)}?`;

    case "arrayType":
      return `${printType(type.elementType)}[${",".repeat(type.rank - 1)}]`;

    default: {
      const exhaustiveCheck: never = type;
      throw new Error(
        `ICE: Unhandled type AST kind: ${JSON.stringify(exhaustiveCheck)}`
      );
    }
  }
};

// ============================================================
// Expression Printer
// ============================================================

const printArguments = (args: readonly CSharpExpressionAst[]): string =>
  args.map(printExpression).join(", ");

export const printExpression = (expr: CSharpExpressionAst): string => {
  switch (expr.kind) {
    case "literalExpression":
      return expr.text;

    case "identifierExpression":
      return escapeCSharpIdentifier(expr.identifier);

    case "thisExpression":
      return "this";

    case "memberAccessExpression":
      return `${printExpression(expr.expression)}.${escapeCSharpIdentifier(expr.memberName)}`;

    case "invocationExpression": {
      const typeArgs =
        expr.typeArguments && expr.typeArguments.length > 0
          ? `<${expr.typeArguments.map(printType).join(", ")}>`
          : "";
      return `${printExpression(expr.expression)}${typeArgs}(${printArguments(expr.arguments)})`;
    }

    case "typeofExpression":
      return `typeof(${printType(expr.type)})`;

    case "arrayCreationExpression": {
      const elementType = printType(expr.elementType);
      if (expr.initializer.length === 0) {
        return `new ${elementType}[0]`;
      }
      return `new ${elementType}[] { ${printArguments(expr.initializer)} }`;
    }

    default: {
      const exhaustiveCheck: never = expr;
      throw new Error(
        `ICE: Unhandled expression AST kind: ${JSON.stringify(exhaustiveCheck)}`
      );
    }
  }
};

// ============================================================
// Statement Printer
// ============================================================

export const printStatement = (
  stmt: CSharpStatementAst,
  indent: string
): string => {
  switch (stmt.kind) {
    case "blockStatement":
      return printBlockStatement(stmt, indent);

    case "expressionStatement":
      return `${indent}${printExpression(stmt.expression)};`;

    case "returnStatement":
      return stmt.expression
        ? `${indent}return ${printExpression(stmt.expression)};`
        : `${indent}return;`;

    default: {
      const exhaustiveCheck: never = stmt;
      throw new Error(
        `ICE: Unhandled statement AST kind: ${JSON.stringify(exhaustiveCheck)}`
      );
    }
  }
};

const printBlockStatement = (
  block: CSharpBlockStatementAst,
  indent: string
): string => {
  if (block.statements.length === 0) {
    return `${indent}{\n${indent}}`;
  }
  const stmts = block.statements
    .map((s) => printStatement(s, indent + INDENT))
    .join("\n");
  return `${indent}{\n${stmts}\n${indent}}`;
};

const printParameters = (params: readonly CSharpParameterAst[]): string =>
  params
    .map((p) => `${printType(p.type)} ${escapeCSharpIdentifier(p.name)}`)
    .join(", ");

// ============================================================
// Member Printer
// ============================================================

export const printMember = (member: CSharpMemberAst, indent: string): string => {
  switch (member.kind) {
    case "commentLine":
      return `${indent}// ${member.text}`;

    case "blankLine":
      return "";

    case "fieldDeclaration": {
      const init = member.initializer
        ? ` = ${printExpression(member.initializer)}`
        : "";
      return `${printDocSummary(member.docSummary, indent)}${indent}${printModifiers(member.modifiers)}${printType(member.type)} ${escapeCSharpIdentifier(member.name)}${init};`;
    }

    case "propertyDeclaration": {
      const inner = indent + INDENT;
      const accessors = [
        ...(member.getter
          ? [`${inner}get => ${printExpression(member.getter)};`]
          : []),
        ...(member.setter
          ? [`${inner}set => ${printExpression(member.setter)};`]
          : []),
      ];
      const header = `${printDocSummary(member.docSummary, indent)}${indent}${printModifiers(member.modifiers)}${printType(member.type)} ${escapeCSharpIdentifier(member.name)}`;
      return [header, `${indent}{`, ...accessors, `${indent}}`].join("\n");
    }

    case "methodDeclaration":
      return `${printDocSummary(member.docSummary, indent)}${indent}${printModifiers(member.modifiers)}${printType(member.returnType)} ${escapeCSharpIdentifier(member.name)}(${printParameters(member.parameters)})\n${printBlockStatement(member.body, indent)}`;

    case "constructorDeclaration": {
      const baseCall =
        member.baseArguments !== undefined
          ? ` : base(${printArguments(member.baseArguments)})`
          : "";
      const signature = `${indent}${printModifiers(member.modifiers)}${escapeCSharpIdentifier(member.name)}(${printParameters(member.parameters)})${baseCall}`;
      // Empty constructors stay on one line
      if (member.body.statements.length === 0) {
        return `${signature} { }`;
      }
      return `${signature}\n${printBlockStatement(member.body, indent)}`;
    }

    default: {
      const exhaustiveCheck: never = member;
      throw new Error(
        `ICE: Unhandled member AST kind: ${JSON.stringify(exhaustiveCheck)}`
      );
    }
  }
};

const printMemberBody = (
  members: readonly CSharpMemberAst[],
  indent: string
): string => {
  if (members.length === 0) {
    return `${indent}{\n${indent}}`;
  }
  const inner = indent + INDENT;
  const body = members.map((m) => printMember(m, inner)).join("\n");
  return `${indent}{\n${body}\n${indent}}`;
};

// ============================================================
// Declaration Printer
// ============================================================

const printEnumMember = (member: CSharpEnumMemberAst, indent: string): string =>
  member.value
    ? `${indent}${escapeCSharpIdentifier(member.name)} = ${printExpression(member.value)}`
    : `${indent}${escapeCSharpIdentifier(member.name)}`;

export const printTypeDeclaration = (
  decl: CSharpTypeDeclarationAst,
  indent: string
): string => {
  const doc = printDocSummary(decl.docSummary, indent);
  const mods = printModifiers(decl.modifiers);
  const name = escapeCSharpIdentifier(decl.name);

  switch (decl.kind) {
    case "classDeclaration": {
      const baseClause = decl.baseType ? ` : ${printType(decl.baseType)}` : "";
      return `${doc}${indent}${mods}class ${name}${baseClause}\n${printMemberBody(decl.members, indent)}`;
    }

    case "structDeclaration":
      return `${doc}${indent}${mods}struct ${name}\n${printMemberBody(decl.members, indent)}`;

    case "interfaceDeclaration":
      return `${doc}${indent}${mods}interface ${name}\n${printMemberBody(decl.members, indent)}`;

    case "enumDeclaration": {
      const header = `${doc}${indent}${mods}enum ${name}`;
      if (decl.members.length === 0) {
        return `${header}\n${indent}{\n${indent}}`;
      }
      const members = decl.members
        .map((m) => printEnumMember(m, indent + INDENT))
        .join(",\n");
      return `${header}\n${indent}{\n${members}\n${indent}}`;
    }

    case "delegateDeclaration":
      return `${doc}${indent}${mods}delegate ${printType(decl.returnType)} ${name}(${printParameters(decl.parameters)});`;

    default: {
      const exhaustiveCheck: never = decl;
      throw new Error(
        `ICE: Unhandled type declaration AST kind: ${JSON.stringify(exhaustiveCheck)}`
      );
    }
  }
};

// ============================================================
// Compilation Unit Printer
// ============================================================

const printNamespaceDeclaration = (
  ns: CSharpNamespaceDeclarationAst
): string => {
  const comments = ns.leadingComments.map((c) => `// ${c}\n`).join("");
  const members = ns.members
    .map((m) => printTypeDeclaration(m, INDENT))
    .join("\n\n");
  const body = members.length > 0 ? `${members}\n` : "";
  return `${comments}namespace ${escapeQualifiedName(ns.name)}\n{\n${body}}`;
};

export const printCompilationUnit = (unit: CSharpCompilationUnitAst): string => {
  const header = unit.headerComments.map((c) => `// ${c}`).join("\n");
  const usings = unit.usings
    .map((u) => `using ${escapeQualifiedName(u.namespace)};`)
    .join("\n");
  const members = unit.members.map(printNamespaceDeclaration).join("\n\n");

  const parts = [header, usings, members].filter((p) => p.length > 0);
  return parts.join("\n\n") + "\n";
};
