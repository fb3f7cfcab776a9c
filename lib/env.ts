import { z } from "zod"
import { PROVIDER_FORMATS } from "./types"
import { ConfigurationError } from "./errors"

const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Dates must use the yyyy-MM-dd format")

export function isValidTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: zone })
    return true
  } catch {
    return false
  }
}

export const pipelineConfigSchema = z.object({
  targetYear: z
    .number({ required_error: "targetYear is required to resolve dates that carry no year" })
    .int("targetYear must be a whole year")
    .min(1970)
    .max(2100),
  knownProviders: z
    .array(z.enum(PROVIDER_FORMATS))
    .min(1, "At least one provider must be enabled")
    .default([...PROVIDER_FORMATS]),
  defaultTimeZone: z
    .string()
    .refine(isValidTimeZone, { message: "defaultTimeZone must be an IANA time zone such as Asia/Ho_Chi_Minh" })
    .default("UTC"),
  dateRange: z
    .object({
      from: isoDateSchema.optional(),
      to: isoDateSchema.optional(),
    })
    .refine((range) => !range.from || !range.to || range.from <= range.to, {
      message: "dateRange.from must not be after dateRange.to",
    })
    .optional(),
})

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>
export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>

export function loadPipelineConfig(input: unknown): PipelineConfig {
  const result = pipelineConfigSchema.safeParse(input)
  if (result.success) {
    return result.data
  }

  console.error("❌ Pipeline configuration validation failed:")
  const issues = result.error.errors.map((err) => {
    const path = err.path.length > 0 ? err.path.join(".") : "config"
    return `${path}: ${err.message}`
  })
  issues.forEach((issue) => console.error(`  ${issue}`))

  throw new ConfigurationError("Invalid pipeline configuration", issues)
}

// Reads TARGET_YEAR, KNOWN_PROVIDERS, DEFAULT_TIME_ZONE, DATE_FROM and DATE_TO
export function pipelineConfigFromEnv(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const providers = env.KNOWN_PROVIDERS
    ?.split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0)

  return loadPipelineConfig({
    targetYear: env.TARGET_YEAR ? Number(env.TARGET_YEAR) : undefined,
    knownProviders: providers && providers.length > 0 ? providers : undefined,
    defaultTimeZone: env.DEFAULT_TIME_ZONE || undefined,
    dateRange: env.DATE_FROM || env.DATE_TO
      ? { from: env.DATE_FROM || undefined, to: env.DATE_TO || undefined }
      : undefined,
  })
}
