import { z } from 'zod';

const hours = z.number().positive();

export const configSchema = z
  .object({
    server: z.object({
      nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
      port: z.number().int().positive().default(3000),
      host: z.string().min(1).default('0.0.0.0'),
      logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    }),
    auth: z.object({
      apiKey: z.string().min(1).optional(),
    }),
    llm: z.object({
      provider: z.enum(['openai', 'anthropic', 'openrouter', 'disabled']).default('disabled'),
      apiKey: z.string().default(''),
      model: z.string().min(1).default('gpt-4o-mini'),
      maxTokens: z.number().int().positive().default(1000),
      temperature: z.number().min(0).max(2).default(0.7),
      timeoutMs: z.number().int().positive().default(30_000),
      maxRetries: z.number().int().min(0).max(1).default(1),
    }),
    sla: z.object({
      criticalHours: hours.default(4),
      highHours: hours.default(8),
      mediumHours: hours.default(24),
      lowHours: hours.default(72),
      otherHours: hours.default(72),
    }),
    report: z.object({
      templatePath: z.string().min(1).default('./templates/report_template.md'),
      title: z.string().min(1).default('Incident Report'),
      format: z.enum(['pdf', 'markdown']).default('pdf'),
      locale: z.enum(['en', 'th']).default('en'),
      decimals: z.number().int().min(0).max(6).default(2),
      pdfFontPath: z.string().min(1).optional(),
    }),
    storage: z.object({
      reportPath: z.string().min(1).default('./reports'),
      maxListLimit: z.number().int().positive().default(100),
      sampleDataPath: z.string().min(1).default('./data/sample_data.json'),
    }),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.llm.provider !== 'disabled' && cfg.llm.apiKey.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['llm', 'apiKey'],
        message: `API key required for provider "${cfg.llm.provider}"`,
      });
    }
  });

export type Config = z.infer<typeof configSchema>;
export type ReportFormat = Config['report']['format'];
