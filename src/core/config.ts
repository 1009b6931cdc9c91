import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import { z } from 'zod';
import yaml from 'yaml';

import { ConfigError } from './errors.js';
import { LOG_LEVELS, isLogLevel } from './logger.js';

const expandHome = (value: string): string => {
  if (value.startsWith('~/')) {
    return join(homedir(), value.slice(2));
  }
  return value;
};

const ConfigSchema = z.object({
  agent: z
    .object({
      maxIterations: z.number().int().positive().default(15),
      returnIntermediateSteps: z.boolean().default(false),
      parserErrorRecovery: z
        .object({
          enabled: z.boolean().default(true),
          // Replaces the raw parse error in the observation when set.
          message: z.string().optional(),
        })
        .default({}),
    })
    .default({}),
  llm: z
    .object({
      provider: z.enum(['anthropic']).default('anthropic'),
      model: z.string().default('claude-3-5-sonnet-latest'),
      maxTokens: z.number().int().positive().default(1024),
      temperature: z.number().min(0).max(1).default(0.2),
      baseUrl: z.string().optional(),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(LOG_LEVELS).default('info'),
    })
    .default({}),
});

export type AgentLoopConfig = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG_PATH = join(homedir(), '.agent-loop', 'config.yaml');

/**
 * Parse and validate a raw config object (as read from YAML).
 */
export function parseConfig(raw: unknown): AgentLoopConfig {
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config: ${issues}`);
  }
  return result.data;
}

/**
 * Load config from YAML, falling back to defaults when the file is absent.
 *
 * Resolution order for the path: argument, AGENT_LOOP_CONFIG_PATH, then
 * ~/.agent-loop/config.yaml.
 */
export function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): AgentLoopConfig {
  const path = expandHome(configPath ?? env.AGENT_LOOP_CONFIG_PATH ?? DEFAULT_CONFIG_PATH);

  let parsed: unknown = {};
  if (existsSync(path)) {
    const raw = readFileSync(path, 'utf-8');
    try {
      parsed = yaml.parse(raw) ?? {};
    } catch (error) {
      throw new ConfigError(`Failed to parse ${path}`, { cause: error });
    }
  } else if (configPath) {
    throw new ConfigError(`Config file not found: ${path}`);
  }

  const cfg = parseConfig(parsed);

  const envIterations = env.AGENT_LOOP_MAX_ITERATIONS;
  if (envIterations) {
    const value = Number(envIterations);
    if (Number.isInteger(value) && value > 0) {
      cfg.agent.maxIterations = value;
    }
  }

  const envLevel = env.AGENT_LOOP_LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    cfg.logging.level = envLevel;
  }

  return cfg;
}
