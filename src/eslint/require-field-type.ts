/**
 * ESLint rule: pathwise/require-field-type
 *
 * In a class that declares at least one property with @field, every other
 * public property must declare one too. An undeclared property resolves
 * with the open type `Object`, so autovivification through it produces a
 * plain object instead of the intended class.
 */

import type { TSESTree } from "@typescript-eslint/utils";
import { ESLintUtils } from "@typescript-eslint/utils";

const PACKAGE = "pathwise";

const createRule = ESLintUtils.RuleCreator(
  (name) => `https://www.npmjs.com/package/pathwise#${name}`,
);

/**
 * Local name of the `field` decorator imported from pathwise, if any.
 */
function findFieldImport(program: TSESTree.Program): string | null {
  for (const stmt of program.body) {
    if (stmt.type !== "ImportDeclaration" || stmt.source.value !== PACKAGE) {
      continue;
    }
    for (const spec of stmt.specifiers) {
      if (
        spec.type === "ImportSpecifier" &&
        ((spec.imported.type === "Identifier" && spec.imported.name === "field") ||
          (spec.imported.type === "Literal" && spec.imported.value === "field"))
      ) {
        return spec.local.name;
      }
    }
  }
  return null;
}

function hasFieldDecorator(node: TSESTree.PropertyDefinition, local: string): boolean {
  return node.decorators.some((d) => {
    const expr = d.expression;
    return (
      expr.type === "CallExpression" &&
      expr.callee.type === "Identifier" &&
      expr.callee.name === local
    );
  });
}

function propertyName(node: TSESTree.PropertyDefinition): string {
  if (node.key.type === "Identifier") return node.key.name;
  if (node.key.type === "Literal") return String(node.key.value);
  return "(computed)";
}

export const requireFieldType = createRule({
  name: "require-field-type",
  meta: {
    type: "suggestion",
    docs: {
      description:
        "Require @field on public properties of classes that declare field types",
    },
    messages: {
      missingFieldType:
        'Property "{{name}}" on "{{className}}" has no @field type; path expressions will treat it as Object.',
    },
    schema: [],
  },
  defaultOptions: [],
  create(context) {
    let fieldLocal: string | null = null;

    function checkClass(node: TSESTree.ClassDeclaration | TSESTree.ClassExpression) {
      const local = fieldLocal;
      if (!local) return;

      const properties = node.body.body.filter(
        (member): member is TSESTree.PropertyDefinition =>
          member.type === "PropertyDefinition",
      );
      if (!properties.some((p) => hasFieldDecorator(p, local))) return;

      const className = node.id?.name ?? "(anonymous)";
      for (const property of properties) {
        if (property.key.type === "PrivateIdentifier") continue;
        if (
          property.accessibility === "private" ||
          property.accessibility === "protected"
        ) {
          continue;
        }
        if (property.declare || hasFieldDecorator(property, local)) continue;

        context.report({
          node: property,
          messageId: "missingFieldType",
          data: { name: propertyName(property), className },
        });
      }
    }

    return {
      Program(program) {
        fieldLocal = findFieldImport(program);
      },
      ClassDeclaration: checkClass,
      ClassExpression: checkClass,
    };
  },
});
