/**
 * Configuration schema for `.pathorder/config.yaml`.
 */
import { z } from 'zod';

/**
 * Makes an object field optional and applies the inner schema defaults
 * when it is missing. Both undefined and null count as missing.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Issue severity. */
export const SeveritySchema = z.enum(['error', 'warning', 'info']);

/** File scanning patterns. */
export const FileScanPatternsSchema = z.object({
  /** Glob patterns for files to include */
  include: z.array(z.string()).default(['**/*.java']),
  /** Glob patterns for files to exclude */
  exclude: z.array(z.string()).default([
    '**/node_modules/**',
    '**/build/**',
    '**/target/**',
    '**/out/**',
  ]),
});

const MethodNameSchema = z.string().regex(/^[A-Za-z_$][\w$]*$/, 'must be a Java method name');

/** Settings of the URL pattern order rule. */
export const UrlPatternOrderRuleSchema = z.object({
  enabled: z.boolean().default(true),
  severity: SeveritySchema.default('warning'),
  /** Invocations whose string arguments are URL patterns */
  matcher_methods: z.array(MethodNameSchema).min(1).default(['antMatchers']),
  /** Invocations that start a fresh authorization chain */
  terminator_methods: z.array(MethodNameSchema).default(['authorizeRequests']),
});

export const RulesConfigSchema = z.object({
  url_pattern_order: withDefaults(UrlPatternOrderRuleSchema),
});

/** Output formats. */
export const OutputFormatSchema = z.enum(['human', 'json', 'compact']);

export const OutputSettingsSchema = z.object({
  format: OutputFormatSchema.default('human'),
  colors: z.boolean().default(true),
});

/** Exit codes configuration. */
export const ExitCodesSchema = z.object({
  success: z.number().int().min(0).default(0),
  error: z.number().int().min(0).default(1),
  /** Used when only warnings or info issues were reported */
  warning: z.number().int().min(0).default(0),
});

/** Complete config.yaml schema. */
export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  files: withDefaults(FileScanPatternsSchema),
  rules: withDefaults(RulesConfigSchema),
  output: withDefaults(OutputSettingsSchema),
  exit_codes: withDefaults(ExitCodesSchema),
});

/** Schema for a config file's content; an empty file means all defaults. */
export const ConfigFileSchema = withDefaults(ConfigSchema);

// Type exports (inferred from schemas)
export type Severity = z.infer<typeof SeveritySchema>;
export type FileScanPatterns = z.infer<typeof FileScanPatternsSchema>;
export type UrlPatternOrderRule = z.infer<typeof UrlPatternOrderRuleSchema>;
export type RulesConfig = z.infer<typeof RulesConfigSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;
export type ExitCodes = z.infer<typeof ExitCodesSchema>;
export type Config = z.infer<typeof ConfigSchema>;
