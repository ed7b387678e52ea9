// eslint.config.mts
import eslint from "@eslint/js";
import eslintCommentsConfigs from "@eslint-community/eslint-plugin-eslint-comments/configs";
import vitest from "eslint-plugin-vitest";
import { defineConfig } from "eslint/config";
import globals from "globals";
import tseslint from "typescript-eslint";

export default defineConfig(
	eslint.configs.recommended,
	tseslint.configs.strictTypeChecked,
	eslintCommentsConfigs.recommended,
	{
		files: ["**/*.ts", "**/*.mts"],
		languageOptions: {
			parser: tseslint.parser,
			globals: { ...globals.node },
			parserOptions: {
				projectService: true,
				tsconfigRootDir: import.meta.dirname,
			},
		},
		rules: {
			complexity: ["error", 15],
			"max-lines-per-function": [
				"error",
				{ max: 60, skipBlankLines: true, skipComments: true },
			],
			"max-params": ["error", 5],
			"max-depth": ["error", 4],
			"max-lines": [
				"error",
				{ max: 300, skipBlankLines: true, skipComments: true },
			],
			"@typescript-eslint/restrict-template-expressions": [
				"error",
				{ allowNumber: true, allowBoolean: false, allowNullish: false },
			],
			"@typescript-eslint/ban-ts-comment": [
				"error",
				{ "ts-ignore": true, "ts-nocheck": true, "ts-expect-error": true },
			],
			"@eslint-community/eslint-comments/no-use": "error",
			"no-restricted-syntax": [
				"error",
				{
					selector: "TSUnknownKeyword",
					message: "Model the value as JSONValue or a union instead of 'unknown'.",
				},
				{
					selector: "SwitchStatement",
					message: "Use ts-pattern match(...).exhaustive() instead of switch.",
				},
				{
					selector:
						"FunctionDeclaration[async=true], FunctionExpression[async=true], ArrowFunctionExpression[async=true]",
					message: "No async/await in src: use Effect.gen / Effect.tryPromise.",
				},
				{
					selector: "NewExpression[callee.name='Promise']",
					message: "No new Promise: use Effect.async.",
				},
			],
		},
	},
	{
		files: ["test/**/*.ts"],
		...vitest.configs.recommended,
		rules: {
			...vitest.configs.recommended.rules,
			"no-restricted-syntax": "off",
			"max-lines-per-function": "off",
		},
	},
	{ ignores: ["dist/**", "coverage/**"] },
);
