import path from 'node:path';
import {config as loadEnvConfig} from 'dotenv';
import {z} from 'zod';
import {ConfigurationError} from './agent/errors.js';
import type {LoopLimits} from './agent/types.js';

loadEnvConfig();

const PROXY_BASE_URL = 'https://aiproxy.sanand.workers.dev/openai/v1';
const OPENAI_BASE_URL = 'https://api.openai.com/v1';

// largest delay setTimeout accepts; longer ones fire after 1ms
const MAX_TIMER_MS = 2_147_483_647;

const positiveInt = (fallback: number) => z.coerce.number().int().positive().max(MAX_TIMER_MS).default(fallback);

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform(value => value === 'true' || value === '1');

const envSchema = z.object({
  LLM_API_KEY: z.string().trim().optional(),
  AIPROXY_TOKEN: z.string().trim().optional(),
  OPENAI_API_KEY: z.string().trim().optional(),
  USE_FALLBACK_API: booleanFlag,
  LLM_BASE_URL: z.string().trim().url().optional(),
  LLM_MODEL: z.string().trim().min(1).default('gpt-4o-mini'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),
  LLM_REQUEST_TIMEOUT_MS: positiveInt(60_000),
  AGENT_MAX_ITERATIONS: positiveInt(15),
  AGENT_TIME_BUDGET_MS: positiveInt(300_000),
  AGENT_MAX_INVALID_ACTIONS: positiveInt(2),
  AGENT_REPEATED_FAILURE_THRESHOLD: z.coerce.number().int().min(2).max(MAX_TIMER_MS).default(2),
  SANDBOX_ROOT: z.string().trim().min(1).default('./data'),
  SHELL_TIMEOUT_MS: positiveInt(30_000),
  CODE_TIMEOUT_MS: positiveInt(30_000),
  HTTP_TIMEOUT_MS: positiveInt(20_000),
  TOOL_MAX_OUTPUT_CHARS: positiveInt(4000),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info')
});

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface LlmConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  temperature: number;
  requestTimeoutMs: number;
}

export interface ToolsConfig {
  sandboxRoot: string;
  shellTimeoutMs: number;
  codeTimeoutMs: number;
  httpTimeoutMs: number;
  maxOutputChars: number;
}

export interface AgentConfig {
  llm: LlmConfig;
  loop: LoopLimits;
  tools: ToolsConfig;
  logLevel: LogLevel;
}

const formatIssues = (error: z.ZodError) =>
  error.issues.map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`).join('; ');

/** Reads the agent configuration from environment variables (and `.env`). */
export const loadAgentConfig = (env: NodeJS.ProcessEnv = process.env): AgentConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }

  const values = parsed.data;
  const apiKey = values.LLM_API_KEY || (values.USE_FALLBACK_API ? values.OPENAI_API_KEY : values.AIPROXY_TOKEN);
  if (!apiKey) {
    throw new ConfigurationError(
      'Missing LLM_API_KEY in the environment (AIPROXY_TOKEN or OPENAI_API_KEY are accepted too).'
    );
  }

  return {
    llm: {
      apiKey,
      baseUrl: values.LLM_BASE_URL ?? (values.USE_FALLBACK_API ? OPENAI_BASE_URL : PROXY_BASE_URL),
      model: values.LLM_MODEL,
      temperature: values.LLM_TEMPERATURE,
      requestTimeoutMs: values.LLM_REQUEST_TIMEOUT_MS
    },
    loop: {
      maxIterations: values.AGENT_MAX_ITERATIONS,
      timeBudgetMs: values.AGENT_TIME_BUDGET_MS,
      maxConsecutiveInvalidActions: values.AGENT_MAX_INVALID_ACTIONS,
      repeatedFailureThreshold: values.AGENT_REPEATED_FAILURE_THRESHOLD
    },
    tools: {
      sandboxRoot: path.resolve(values.SANDBOX_ROOT),
      shellTimeoutMs: values.SHELL_TIMEOUT_MS,
      codeTimeoutMs: values.CODE_TIMEOUT_MS,
      httpTimeoutMs: values.HTTP_TIMEOUT_MS,
      maxOutputChars: values.TOOL_MAX_OUTPUT_CHARS
    },
    logLevel: values.LOG_LEVEL
  };
};
