import type { Node, Statement, TSEntityName } from "@babel/types";
import { babelParse, parse, type SFCScriptBlock } from "@vue/compiler-sfc";
import type { SfcFacts, SfcImport } from "./types.js";

const qualifiedName = (node: TSEntityName): string => {
  if (node.type === "Identifier") return node.name;
  if (node.type === "TSQualifiedName") return `${qualifiedName(node.left)}.${node.right.name}`;
  return "";
};

/** Collects referenced type names from a TS type node (annotations, unions, literals, ...). */
export const collectTypeNames = (node: Node | null | undefined, out: Set<string>): void => {
  if (!node) return;
  switch (node.type) {
    case "TSTypeAnnotation":
      collectTypeNames(node.typeAnnotation, out);
      return;
    case "TSTypeReference": {
      const name = qualifiedName(node.typeName);
      if (name) out.add(name);
      node.typeParameters?.params.forEach((param) => collectTypeNames(param, out));
      return;
    }
    case "TSArrayType":
      collectTypeNames(node.elementType, out);
      return;
    case "TSUnionType":
    case "TSIntersectionType":
      node.types.forEach((item) => collectTypeNames(item, out));
      return;
    case "TSTupleType":
      node.elementTypes.forEach((item) => collectTypeNames(item, out));
      return;
    case "TSNamedTupleMember":
      collectTypeNames(node.elementType, out);
      return;
    case "TSTypeLiteral":
      node.members.forEach((member) => {
        if (member.type === "TSPropertySignature" || member.type === "TSMethodSignature") {
          collectTypeNames(member.typeAnnotation, out);
        }
      });
      return;
    default:
      return;
  }
};

const collectFromCall = (node: Node | null | undefined, out: Set<string>): void => {
  if (!node || node.type !== "CallExpression") return;
  node.typeParameters?.params.forEach((param) => collectTypeNames(param, out));
  // withDefaults(defineProps<Props>(), {...})
  node.arguments.forEach((arg) => collectFromCall(arg, out));
};

type Collected = {
  interfaces: string[];
  typeAnnotations: Set<string>;
  imports: SfcImport[];
  variables: string[];
};

const visitStatement = (stmt: Statement, acc: Collected): void => {
  switch (stmt.type) {
    case "TSInterfaceDeclaration":
      acc.interfaces.push(stmt.id.name);
      return;
    case "TSTypeAliasDeclaration":
      acc.typeAnnotations.add(stmt.id.name);
      return;
    case "ImportDeclaration":
      acc.imports.push({ source: stmt.source.value, isTypeOnly: stmt.importKind === "type" });
      return;
    case "VariableDeclaration":
      stmt.declarations.forEach((decl) => {
        if (decl.id.type === "Identifier") {
          acc.variables.push(decl.id.name);
          collectTypeNames(decl.id.typeAnnotation, acc.typeAnnotations);
        }
        collectFromCall(decl.init, acc.typeAnnotations);
      });
      return;
    case "FunctionDeclaration":
      if (stmt.typeParameters?.type === "TSTypeParameterDeclaration") {
        stmt.typeParameters.params.forEach((param) => acc.typeAnnotations.add(param.name));
      }
      collectTypeNames(stmt.returnType, acc.typeAnnotations);
      stmt.params.forEach((param) => {
        if (param.type === "Identifier") collectTypeNames(param.typeAnnotation, acc.typeAnnotations);
      });
      return;
    case "ExpressionStatement":
      collectFromCall(stmt.expression, acc.typeAnnotations);
      return;
    case "ExportNamedDeclaration":
      if (stmt.declaration) visitStatement(stmt.declaration, acc);
      return;
    default:
      return;
  }
};

/**
 * Parses a Vue SFC and extracts interfaces, referenced types, imports and top-level variable
 * names from its script blocks. Throws on unparsable input.
 */
export const extractSfcFacts = (source: string, filename = "Component.vue"): SfcFacts => {
  const { descriptor, errors } = parse(source, { filename });
  if (errors.length > 0) {
    throw new Error(`Parse error: ${errors[0].message}`);
  }

  const blocks = [descriptor.script, descriptor.scriptSetup].filter((block): block is SFCScriptBlock => block !== null);
  if (blocks.length === 0) {
    return { hasScriptLangTs: false, scriptLang: null, interfaces: [], typeAnnotations: [], imports: [], variables: [] };
  }

  const acc: Collected = { interfaces: [], typeAnnotations: new Set(), imports: [], variables: [] };
  blocks.forEach((block) => {
    const ast = babelParse(block.content, { sourceType: "module", plugins: ["typescript"] });
    ast.program.body.forEach((stmt) => visitStatement(stmt, acc));
  });

  // <script setup> decides the component's language when both blocks exist
  const primary = descriptor.scriptSetup ?? descriptor.script;
  const scriptLang = primary?.lang ?? null;
  return {
    hasScriptLangTs: scriptLang === "ts",
    scriptLang,
    interfaces: acc.interfaces,
    typeAnnotations: Array.from(acc.typeAnnotations),
    imports: acc.imports,
    variables: acc.variables
  };
};
