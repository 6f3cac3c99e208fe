const MATRIX_REF = /\$\{\{\s*matrix\.([A-Za-z0-9_.-]+?)\s*\}\}/g;

/** Axis names referenced as `${{ matrix.<name> }}`, in order of appearance. */
export function matrixReferences(template: string): string[] {
  return [...template.matchAll(MATRIX_REF)].map((m) => m[1]);
}

/**
 * Substitutes `${{ matrix.<name> }}` with the bound value. Unbound
 * references are left as written; callers validate them beforehand.
 */
export function renderTemplate(template: string, bindings: Readonly<Record<string, string>>): string {
  return template.replace(MATRIX_REF, (match, name: string) => bindings[name] ?? match);
}

export function renderEnv(
  env: Readonly<Record<string, string>> | undefined,
  bindings: Readonly<Record<string, string>>,
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env ?? {})) {
    result[key] = renderTemplate(value, bindings);
  }
  return result;
}
