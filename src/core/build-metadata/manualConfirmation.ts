import type { ConfigOptions, ConfigVariable } from "./buildMetadata.types";

const variableReference = /\$[A-Za-z]\w*/g;

const toVariableMap = (variables: ConfigVariable[] | undefined): Map<string, string> => {
  const byKey = new Map<string, string>();
  for (const variable of variables ?? []) {
    if (variable.value == null) {
      byKey.delete(variable.key);
      continue;
    }
    byKey.set(variable.key, variable.value);
  }
  return byKey;
};

/**
 * Expands `$NAME` references in a manual job's confirmation prompt to `$NAME=value`
 * so the person confirming sees what the job will run with.
 */
export const manualConfirmationMessage = (
  configOptions: ConfigOptions | undefined,
  configVariables: ConfigVariable[] | undefined
): string | undefined => {
  const template = configOptions?.manualConfirmation;
  if (typeof template !== "string") return undefined;

  const variables = toVariableMap(configVariables);
  return template.replace(variableReference, (match) => {
    const name = match.slice(1);
    const value = variables.get(name);
    return value === undefined ? match : `$${name}=${value}`;
  });
};
