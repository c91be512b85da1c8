/**
 * pathwise ESLint plugin.
 *
 * Install @typescript-eslint/utils as a peer dependency to use this plugin.
 *
 * Usage (flat config):
 *
 *   import pathwise from "pathwise/eslint";
 *   export default [pathwise.configs.recommended];
 */

import { requireFieldType } from "./require-field-type.ts";

const rules = {
  "require-field-type": requireFieldType,
};

const plugin: {
  meta: { name: string; version: string };
  rules: typeof rules;
  configs: Record<string, unknown>;
} = {
  meta: {
    name: "pathwise",
    version: "0.1.0",
  },
  rules,
  configs: {},
};

plugin.configs.recommended = {
  plugins: { pathwise: plugin },
  rules: {
    "pathwise/require-field-type": "warn",
  },
};

export default plugin;
