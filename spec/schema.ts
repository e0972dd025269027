/**
 * Zod schemas for script documents
 */
import { z } from 'zod';

// ============================================================================
// Statements
// ============================================================================

/** A statement is one line of source, or a structured if/then/else block */
export type StatementDSL =
  | string
  | {
      if: string;
      then: StatementDSL[];
      else?: StatementDSL[];
    };

/**
 * An unquoted line containing `: ` reads as a one-key YAML mapping,
 * e.g. `ma = up ? a : b` → `{ "ma = up ? a": "b" }`. Join it back into the line.
 */
export function rejoinStatement(input: unknown): unknown {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    return input;
  }
  const entries = Object.entries(input);
  if (entries.length !== 1) {
    return input;
  }
  const [[key, value]] = entries;
  if (key === 'if') {
    return input;
  }
  if (value === null) {
    return `${key}: null`;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return `${key}: ${String(value)}`;
  }
  return input;
}

export const StatementDSLSchema: z.ZodType<StatementDSL, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.preprocess(
    rejoinStatement,
    z.union(
      [
        z.string().min(1),
        z
          .object({
            if: z.string().min(1),
            then: z.array(StatementDSLSchema),
            else: z.array(StatementDSLSchema).optional(),
          })
          .strict(),
      ],
      {
        errorMap: () => ({
          message: 'Statement must be a line of source or an { if, then, else } block',
        }),
      }
    )
  )
);

// ============================================================================
// Declarations
// ============================================================================

// "close, volume" or ["close:decimal", "volume"]
export const ParamListDSLSchema = z
  .union([z.string(), z.array(z.string().min(1))])
  .optional()
  .default([]);

export const FunctionDSLSchema = z.object({
  name: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'Function name must be an identifier'),
  // "x", "x:number", "factor = 2"
  params: ParamListDSLSchema,
  body: z.array(StatementDSLSchema).min(1),
});

// ============================================================================
// Scripts
// ============================================================================

export const DataScriptDSLSchema = z
  .object({
    imports: z.array(z.string().min(1)).optional().default([]),
    input: ParamListDSLSchema,
    output: ParamListDSLSchema,
    precision: z.number().int().min(0).max(28).optional(),
    functions: z.array(FunctionDSLSchema).optional().default([]),
    error: z.array(StatementDSLSchema).optional(),
    body: z.array(StatementDSLSchema).min(1),
  })
  .strict();

export const PackageScriptDSLSchema = z
  .object({
    package: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'Package name must be an identifier'),
    // "PI = 3.14159"
    variables: z.array(z.string().min(1)).optional().default([]),
    functions: z.array(FunctionDSLSchema).optional().default([]),
  })
  .strict();

export type DataScriptDSL = z.infer<typeof DataScriptDSLSchema>;
export type PackageScriptDSL = z.infer<typeof PackageScriptDSLSchema>;
export type FunctionDSL = z.infer<typeof FunctionDSLSchema>;

// ============================================================================
// Validation helpers
// ============================================================================

export function isPackageDocument(input: unknown): boolean {
  return typeof input === 'object' && input !== null && 'package' in input;
}

export function validateDataScriptDSL(input: unknown): DataScriptDSL {
  return DataScriptDSLSchema.parse(input);
}

export function validatePackageScriptDSL(input: unknown): PackageScriptDSL {
  return PackageScriptDSLSchema.parse(input);
}
