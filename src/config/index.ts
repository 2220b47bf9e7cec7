import 'dotenv/config';
import { ZodError } from 'zod';
import { configSchema, type Config } from './validation.js';

const int = (value: string | undefined): number | undefined =>
  value ? parseInt(value, 10) : undefined;

const float = (value: string | undefined): number | undefined =>
  value ? parseFloat(value) : undefined;

function providerApiKey(provider: string | undefined): string | undefined {
  switch (provider) {
    case 'openai':
      return process.env.OPENAI_API_KEY;
    case 'anthropic':
      return process.env.ANTHROPIC_API_KEY;
    case 'openrouter':
      return process.env.OPENROUTER_API_KEY;
    default:
      return undefined;
  }
}

function loadConfig(): Config {
  const rawConfig = {
    server: {
      nodeEnv: process.env.NODE_ENV,
      port: int(process.env.PORT),
      host: process.env.HOST || undefined,
      logLevel: process.env.LOG_LEVEL || undefined,
    },
    auth: {
      apiKey: process.env.API_KEY || undefined,
    },
    llm: {
      provider: process.env.LLM_PROVIDER || undefined,
      apiKey: providerApiKey(process.env.LLM_PROVIDER) || '',
      model: process.env.LLM_MODEL || undefined,
      maxTokens: int(process.env.LLM_MAX_TOKENS),
      temperature: float(process.env.LLM_TEMPERATURE),
      timeoutMs: int(process.env.LLM_TIMEOUT_MS),
      maxRetries: int(process.env.LLM_MAX_RETRIES),
    },
    sla: {
      criticalHours: float(process.env.SLA_CRITICAL_HOURS),
      highHours: float(process.env.SLA_HIGH_HOURS),
      mediumHours: float(process.env.SLA_MEDIUM_HOURS),
      lowHours: float(process.env.SLA_LOW_HOURS),
      otherHours: float(process.env.SLA_OTHER_HOURS),
    },
    report: {
      templatePath: process.env.REPORT_TEMPLATE_PATH || undefined,
      title: process.env.REPORT_TITLE || undefined,
      format: process.env.REPORT_FORMAT || undefined,
      locale: process.env.REPORT_LOCALE || undefined,
      decimals: int(process.env.REPORT_DECIMALS),
      pdfFontPath: process.env.REPORT_PDF_FONT_PATH || undefined,
    },
    storage: {
      reportPath: process.env.REPORT_STORAGE_PATH || undefined,
      maxListLimit: int(process.env.REPORT_LIST_MAX_LIMIT),
      sampleDataPath: process.env.SAMPLE_DATA_PATH || undefined,
    },
  };

  try {
    return configSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('\n❌ Invalid configuration:\n');
      error.issues.forEach(issue => {
        const field = issue.path.join('.');
        console.error(`  ${field}: ${issue.message}`);
      });
      console.error('\nCheck .env file and compare with .env.example\n');
    } else {
      console.error('Config error:', error);
    }
    process.exit(1);
  }
}

export const config = loadConfig();
