// pattern: Imperative Shell

import { Command, Option } from "@commander-js/extra-typings";
import YAML from "yaml";

import { ShellSettingsV1 } from "../../config/types/v1/index.js";

/**
 * Renders a TypeBox schema in the requested format
 */
export function renderSchema(schema: object, format: "json" | "yaml"): string {
  return format === "json"
    ? JSON.stringify(schema, null, 2)
    : YAML.stringify(schema);
}

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeSchemaCommand() {
  return new Command("schema")
    .description("Output the JSON schema for sandshell settings files")
    .addOption(
      new Option("-f, --format <format>", "Output format")
        .choices(["json", "yaml"] as const)
        .default("json" as const)
    )
    .addHelpText(
      "after",
      `
Examples:
  sandshell schema                       Output the settings schema as JSON
  sandshell schema --format yaml         Output the settings schema as YAML
  sandshell schema > sandshell.schema.json
      `
    )
    .action(options => {
      // eslint-disable-next-line no-console
      console.log(renderSchema(ShellSettingsV1, options.format));
    });
}
