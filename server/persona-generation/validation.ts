import type { ZodType, ZodTypeDef } from "zod";

export interface ValidationResult<T> {
  valid: boolean;
  items: T[];
  errors: string[];
  warnings: string[];
}

function extractPersonaArray(raw: unknown): unknown[] | null {
  if (Array.isArray(raw)) return raw;
  if (typeof raw === "object" && raw !== null && "personas" in raw) {
    const personas: unknown = raw.personas;
    if (Array.isArray(personas)) return personas;
  }
  return null;
}

function countDuplicates(values: string[]): number {
  return values.length - new Set(values).size;
}

/**
 * Validates a generated batch: exact count, then every entry against the schema.
 * Issues are phrased so they can be fed back to the model verbatim.
 */
export function validatePersonaBatch<T extends { name?: string; role?: string }>(
  raw: unknown,
  expectedCount: number,
  schema: ZodType<T, ZodTypeDef, unknown>,
): ValidationResult<T> {
  const errors: string[] = [];
  const warnings: string[] = [];
  const items: T[] = [];

  const entries = extractPersonaArray(raw);
  if (entries === null) {
    return {
      valid: false,
      items,
      errors: [`response must be an object with a "personas" array`],
      warnings,
    };
  }

  if (entries.length !== expectedCount) {
    errors.push(`expected exactly ${expectedCount} personas, received ${entries.length}`);
  }

  entries.forEach((entry, index) => {
    const parsed = schema.safeParse(entry);
    if (parsed.success) {
      items.push(parsed.data);
      return;
    }
    for (const issue of parsed.error.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "entry";
      errors.push(`persona ${index + 1}: ${path}: ${issue.message}`);
    }
  });

  const labels = items
    .map((p) => (p.name ?? p.role ?? "").toLowerCase().trim())
    .filter((label) => label.length > 0);
  const duplicates = countDuplicates(labels);
  if (duplicates > 0) {
    warnings.push(`${duplicates} duplicate persona name(s) found`);
  }

  return { valid: errors.length === 0, items, errors, warnings };
}

export function buildCorrectionPrompt(errors: string[]): string {
  return `CORRECTION REQUIRED:
The previous generation failed validation. Specific issues:
${errors.join("\n")}

Regenerate the full persona set, ensuring:
- Each issue listed above is addressed
- All other requirements from the original prompt still apply
- The response is a single JSON object with a "personas" array`;
}
