/**
 * Namespace emission
 *
 * Writes one compilation unit for one admitted namespace. Declarations
 * are emitted kind by kind (delegates, enums, interfaces, structs,
 * classes); within a kind the dump order is kept.
 */

import {
  declarationGroup,
  type DeclarationGroup,
  EMISSION_ORDER,
  type TypeDeclaration,
  type TypeRegistry,
} from "@wrapgen/frontend";
import {
  printCompilationUnit,
  type CSharpCompilationUnitAst,
  type CSharpTypeDeclarationAst,
  type CSharpUsingDirectiveAst,
} from "./core/format/backend-ast/index.js";
import { generateFileHeader } from "./constants.js";
import {
  createNamespaceScope,
  emitClass,
  emitDelegate,
  emitEnum,
  emitInterface,
  emitStruct,
  type NamespaceScope,
} from "./declarations/index.js";
import { wrapperFileName } from "./naming.js";
import type { EmitterOptions, NamespaceEmission } from "./types.js";

type DeclarationEmitter = (
  scope: NamespaceScope,
  decl: TypeDeclaration
) => CSharpTypeDeclarationAst | undefined;

const EMITTERS: Readonly<Record<DeclarationGroup, DeclarationEmitter>> = {
  delegate: emitDelegate,
  enum: emitEnum,
  interface: emitInterface,
  struct: emitStruct,
  class: emitClass,
};

const usingsFor = (
  registry: TypeRegistry,
  outputNamespace: string
): readonly string[] =>
  [...registry.imports].filter((ns) => ns !== outputNamespace).sort();

export const emitNamespace = (
  namespace: string,
  declarations: readonly TypeDeclaration[],
  registry: TypeRegistry,
  options: EmitterOptions = {}
): NamespaceEmission => {
  const scope = createNamespaceScope(registry, namespace);

  const members = EMISSION_ORDER.flatMap((group) =>
    declarations
      .filter((decl) => declarationGroup(decl) === group)
      .flatMap((decl) => {
        const emitted = EMITTERS[group](scope, decl);
        return emitted === undefined ? [] : [emitted];
      })
  );

  if (members.length === 0) {
    return { file: undefined, typeCount: 0, exclusions: scope.exclusions() };
  }

  const { outputNamespace } = scope;
  const unit: CSharpCompilationUnitAst = {
    kind: "compilationUnit",
    headerComments: generateFileHeader(outputNamespace, options),
    usings: usingsFor(registry, outputNamespace).map(
      (ns): CSharpUsingDirectiveAst => ({
        kind: "usingDirective",
        namespace: ns,
      })
    ),
    members: [
      {
        kind: "namespaceDeclaration",
        leadingComments: scope.isSanitized
          ? [`Original namespace: ${namespace}`]
          : [],
        name: outputNamespace,
        members,
      },
    ],
  };

  return {
    file: {
      fileName: wrapperFileName(
        registry.config.output.filePrefix,
        outputNamespace
      ),
      namespace: outputNamespace,
      text: printCompilationUnit(unit),
    },
    typeCount: members.length,
    exclusions: scope.exclusions(),
  };
};
