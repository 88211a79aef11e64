import { type Static, Type } from "@sinclair/typebox";

export const ShellSettingsV1 = Type.Object(
  {
    version: Type.Optional(Type.Literal(1)),
    allowedRoot: Type.Optional(
      Type.String({
        minLength: 1,
        description:
          "Directory outside of which nothing may be read, written or deleted. Relative paths are resolved against the settings file's directory. Defaults to '.'.",
      })
    ),
    recycleBin: Type.Optional(
      Type.String({
        minLength: 1,
        description:
          "Where deleted paths are moved. Relative paths are resolved against the allowed root. Defaults to '.recycle_bin'.",
      })
    ),
    dryRun: Type.Optional(
      Type.Boolean({
        description:
          "If true, mutating commands are validated and reported but not applied.",
        default: false,
      })
    ),
    safeMode: Type.Optional(
      Type.Boolean({
        description:
          "If true, arguments matching the denylist are rejected; otherwise they only produce a warning.",
        default: true,
      })
    ),
    prompt: Type.Optional(
      Type.String({ description: "Prompt suffix for the interactive shell." })
    ),
    colors: Type.Optional(
      Type.Boolean({ description: "Colour command output.", default: true })
    ),
  },
  { additionalProperties: false }
);
export type ShellSettingsV1 = Static<typeof ShellSettingsV1>;
