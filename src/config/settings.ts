// src/config/settings.ts

/**
 * @file Settings for the kernel and its default providers.
 * Values come from, lowest precedence first: built-in defaults, an optional YAML or JSON
 * settings file, then environment variables.
 */

import fs from 'fs';
import yaml from 'js-yaml';
import Ajv from 'ajv';
import addFormats from 'ajv-formats';
import { ConfigurationError } from '../core/errors';
import { isLogLevel, LOG_LEVELS, LogLevel } from '../core/logger';
import { AgentDefaults, DEFAULT_AGENT_DEFAULTS } from '../agents/config';

export interface OpenAISettings {
  apiKey?: string;
  baseURL?: string;
  organizationId?: string;
  textModel: string;
  embeddingModel: string;
}

export interface LoggingSettings {
  enabled: boolean;
  level: LogLevel;
}

export interface GenerationSettings {
  temperature: number;
  maxTokens: number;
  topP: number;
  frequencyPenalty: number;
  presencePenalty: number;
}

export interface ToolCallingSettings {
  /** Follow-up requests allowed after tool results within one generation. */
  maxToolCallContinuations: number;
}

export interface Settings {
  openai: OpenAISettings;
  logging: LoggingSettings;
  generation: GenerationSettings;
  agents: AgentDefaults;
  toolCalling: ToolCallingSettings;
}

/**
 * Shape of a settings file: every section and field is optional.
 */
export interface SettingsFile {
  openai?: Partial<OpenAISettings>;
  logging?: Partial<LoggingSettings>;
  generation?: Partial<GenerationSettings>;
  agents?: Partial<AgentDefaults>;
  toolCalling?: Partial<ToolCallingSettings>;
}

export const DEFAULT_SETTINGS: Readonly<Settings> = {
  openai: {
    textModel: 'gpt-4o',
    embeddingModel: 'text-embedding-3-small',
  },
  logging: {
    enabled: false,
    level: 'info',
  },
  generation: {
    temperature: 0.7,
    maxTokens: 1000,
    topP: 1,
    frequencyPenalty: 0,
    presencePenalty: 0,
  },
  agents: { ...DEFAULT_AGENT_DEFAULTS },
  toolCalling: {
    maxToolCallContinuations: 10,
  },
};

const positiveInteger = { type: 'integer', minimum: 1 };
const penalty = { type: 'number', minimum: -2, maximum: 2 };

const SETTINGS_FILE_SCHEMA = {
  type: 'object',
  additionalProperties: false,
  properties: {
    openai: {
      type: 'object',
      additionalProperties: false,
      properties: {
        apiKey: { type: 'string' },
        baseURL: { type: 'string', format: 'uri' },
        organizationId: { type: 'string' },
        textModel: { type: 'string', minLength: 1 },
        embeddingModel: { type: 'string', minLength: 1 },
      },
    },
    logging: {
      type: 'object',
      additionalProperties: false,
      properties: {
        enabled: { type: 'boolean' },
        level: { type: 'string', enum: [...LOG_LEVELS] },
      },
    },
    generation: {
      type: 'object',
      additionalProperties: false,
      properties: {
        temperature: { type: 'number', minimum: 0, maximum: 2 },
        maxTokens: positiveInteger,
        topP: { type: 'number', minimum: 0, maximum: 1 },
        frequencyPenalty: penalty,
        presencePenalty: penalty,
      },
    },
    agents: {
      type: 'object',
      additionalProperties: false,
      properties: {
        maxIterations: positiveInteger,
        stopPhrase: { type: 'string', minLength: 1 },
        maxRetries: positiveInteger,
        memorySearchLimit: positiveInteger,
        collaborativeMaxIterations: positiveInteger,
      },
    },
    toolCalling: {
      type: 'object',
      additionalProperties: false,
      properties: {
        maxToolCallContinuations: { type: 'integer', minimum: 0 },
      },
    },
  },
};

const ajv = new Ajv({ allErrors: true });
addFormats(ajv);
const validateSettingsFile = ajv.compile<SettingsFile>(SETTINGS_FILE_SCHEMA);

/**
 * Parses settings file text (YAML or JSON) and validates it.
 *
 * @throws ConfigurationError when the text does not parse or fails the schema.
 */
export function parseSettingsFile(text: string, source = 'settings'): SettingsFile {
  let parsed: unknown;
  try {
    parsed = yaml.load(text);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to parse ${source}: ${message}`, { source });
  }
  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!validateSettingsFile(parsed)) {
    throw new ConfigurationError(
      `Invalid ${source}: ${ajv.errorsText(validateSettingsFile.errors, { dataVar: 'settings' })}`,
      { source, errors: validateSettingsFile.errors ?? [] }
    );
  }
  return parsed;
}

function readSettingsFile(file: string): SettingsFile {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf8');
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read settings file ${file}: ${message}`, { file });
  }
  return parseSettingsFile(text, `settings file ${file}`);
}

function parseBoolean(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off', ''].includes(normalized)) return false;
  throw new ConfigurationError(`${name} must be a boolean, got "${value}".`, { [name]: value });
}

/**
 * Settings taken from environment variables.
 *
 * @throws ConfigurationError for a malformed AGENT_LOGGING_ENABLED or AGENT_LOG_LEVEL.
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv): SettingsFile {
  const openai: Partial<OpenAISettings> = {};
  if (env.OPENAI_API_KEY) openai.apiKey = env.OPENAI_API_KEY;
  if (env.OPENAI_BASE_URL) openai.baseURL = env.OPENAI_BASE_URL;
  if (env.OPENAI_ORG_ID) openai.organizationId = env.OPENAI_ORG_ID;
  if (env.OPENAI_MODEL) openai.textModel = env.OPENAI_MODEL;
  if (env.OPENAI_EMBEDDING_MODEL) openai.embeddingModel = env.OPENAI_EMBEDDING_MODEL;

  const logging: Partial<LoggingSettings> = {};
  if (env.AGENT_LOGGING_ENABLED !== undefined) {
    logging.enabled = parseBoolean('AGENT_LOGGING_ENABLED', env.AGENT_LOGGING_ENABLED);
  }
  if (env.AGENT_LOG_LEVEL !== undefined) {
    const level = env.AGENT_LOG_LEVEL.trim().toLowerCase();
    if (!isLogLevel(level)) {
      throw new ConfigurationError(
        `AGENT_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${env.AGENT_LOG_LEVEL}".`
      );
    }
    logging.level = level;
  }
  return { openai, logging };
}

/**
 * Overlays `layer` onto `base`, one section at a time.
 */
export function mergeSettings(base: Settings, layer: SettingsFile): Settings {
  return {
    openai: { ...base.openai, ...layer.openai },
    logging: { ...base.logging, ...layer.logging },
    generation: { ...base.generation, ...layer.generation },
    agents: { ...base.agents, ...layer.agents },
    toolCalling: { ...base.toolCalling, ...layer.toolCalling },
  };
}

export interface LoadSettingsOptions {
  /** Path of a YAML or JSON settings file. */
  file?: string;
  /** Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
}

export function loadSettings(options: LoadSettingsOptions = {}): Settings {
  let settings = mergeSettings(DEFAULT_SETTINGS, {});
  if (options.file !== undefined) {
    settings = mergeSettings(settings, readSettingsFile(options.file));
  }
  return mergeSettings(settings, settingsFromEnv(options.env ?? process.env));
}
