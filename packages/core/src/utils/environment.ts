/**
 * Captures the process environment as a plain string map.
 *
 * The snapshot seeds the template variables of every request, so a claim requirement
 * such as `{{.Domain}}` can be pinned per deployment without editing the configuration.
 * Taken once when the guard is constructed; later changes to `process.env` are not seen.
 *
 * @param env - Environment to copy (defaults to `process.env`)
 * @returns Copy of every defined variable
 */
export function snapshotEnvironment(
  env: NodeJS.ProcessEnv = process.env,
): Record<string, string> {
  const variables: Record<string, string> = {};
  for (const [name, value] of Object.entries(env)) {
    if (value !== undefined) {
      variables[name] = value;
    }
  }
  return variables;
}
