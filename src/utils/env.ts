export function toEnvRecord(env: Record<string, string | undefined>): Record<string, string> {
  const record: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      record[key] = value;
    }
  }

  return record;
}
