import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';

// Process-level settings, environment only
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).optional(),
  CONFIG_FILE: z.string().optional(),
});

export const env = envSchema.parse(process.env);

// config.yaml layout; every key optional, env vars win
const fileSchema = z
  .object({
    github: z
      .object({
        token: z.string().optional(),
        owner: z.string().optional(),
      })
      .nullish(),
    slack: z
      .object({
        bot_token: z.string().optional(),
        default_channel: z.string().optional(),
      })
      .nullish(),
    zentao: z
      .object({
        url: z.string().optional(),
        account: z.string().optional(),
        password: z.union([z.string(), z.number()]).transform(String).optional(),
      })
      .nullish(),
  })
  .nullable();

type FileConfig = NonNullable<z.infer<typeof fileSchema>>;

export interface GitHubConfig {
  token: string;
  owner: string;
}

export interface SlackConfig {
  botToken: string;
  defaultChannel: string;
}

export interface ZentaoConfig {
  url: string;
  account: string;
  password: string;
}

export interface AppConfig {
  github: GitHubConfig;
  slack: SlackConfig;
  /** Present only when both URL and account are configured */
  zentao?: ZentaoConfig;
  /** Path of the YAML file that was read, if any */
  source?: string;
}

export interface LoadConfigOptions {
  /** Explicit YAML path; a missing explicit file is an error */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export const DEFAULT_CONFIG_FILE = 'config.yaml';
export const DEFAULT_SLACK_CHANNEL = '#general';

function readConfigFile(path: string): FileConfig {
  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${path}`, { cause: error });
  }

  const result = fileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config file ${path}: ${issues}`);
  }
  return result.data ?? {};
}

/**
 * Locate the YAML file: explicit path, then CONFIG_FILE, then ./config.yaml
 * when it exists.
 */
function findConfigFile(options: LoadConfigOptions, processEnv: NodeJS.ProcessEnv): string | undefined {
  const cwd = options.cwd ?? process.cwd();
  const explicit = options.configPath ?? processEnv.CONFIG_FILE;

  if (explicit) {
    const path = resolve(cwd, explicit);
    if (!existsSync(path)) {
      throw new ConfigError(`Config file not found: ${path}`);
    }
    return path;
  }

  const fallback = resolve(cwd, DEFAULT_CONFIG_FILE);
  return existsSync(fallback) ? fallback : undefined;
}

function pick(...values: Array<string | undefined>): string {
  for (const value of values) {
    if (value !== undefined && value !== '') return value;
  }
  return '';
}

/**
 * Load gateway configuration.
 * Precedence: environment variable > YAML file > default.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const processEnv = options.env ?? process.env;
  const source = findConfigFile(options, processEnv);
  const file: FileConfig = source ? readConfigFile(source) : {};

  const github: GitHubConfig = {
    token: pick(processEnv.GITHUB_TOKEN, file.github?.token),
    owner: pick(processEnv.GITHUB_OWNER, file.github?.owner),
  };
  const slack: SlackConfig = {
    botToken: pick(processEnv.SLACK_BOT_TOKEN, file.slack?.bot_token),
    defaultChannel: pick(processEnv.SLACK_DEFAULT_CHANNEL, file.slack?.default_channel, DEFAULT_SLACK_CHANNEL),
  };

  if (!github.token) {
    throw new ConfigError('Missing GitHub token: set GITHUB_TOKEN or github.token in config.yaml');
  }
  if (!slack.botToken) {
    throw new ConfigError('Missing Slack bot token: set SLACK_BOT_TOKEN or slack.bot_token in config.yaml');
  }

  const zentaoUrl = pick(processEnv.ZENTAO_URL, file.zentao?.url);
  const zentaoAccount = pick(processEnv.ZENTAO_ACCOUNT, file.zentao?.account);
  const zentao: ZentaoConfig | undefined =
    zentaoUrl && zentaoAccount
      ? {
          url: zentaoUrl,
          account: zentaoAccount,
          password: pick(processEnv.ZENTAO_PASSWORD, file.zentao?.password),
        }
      : undefined;

  return { github, slack, zentao, source };
}
