const enabledValues = new Set(["1", "true", "yes", "on"]);

export const isEnabled = (value: string | undefined | null) =>
  typeof value === "string" && enabledValues.has(value.trim().toLowerCase());

// Blank variables count as unset so their defaults apply.
export const readEnv = (env: NodeJS.ProcessEnv, key: string) => {
  const value = env[key]?.trim();
  return value ? value : undefined;
};
