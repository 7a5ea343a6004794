/**
 * Load recorder configuration from YAML.
 *
 * Accepts either a flat map of parameters or a ROS parameter file
 * (`<node>: { ros__parameters: { ... } }`). Values are merged as
 * defaults < file < overrides and validated with zod.
 */

import { existsSync, readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  ALL_TOPICS_WILDCARD,
  DEFAULT_CONTROL_MESSAGE_TYPE,
  DEFAULT_CONTROL_TOPIC,
  DEFAULT_DATA_FOLDER,
  DEFAULT_FILE_DURATION_S,
  DEFAULT_LOGGED_TOPICS,
} from '../constants.js';
import { InvalidConfigError, errorMessage } from '../errors.js';

export const RecorderConfigSchema = z
  .object({
    dataFolder: z.string().min(1, 'must not be empty'),
    fileDuration: z.number().int('must be a whole number of seconds').positive(),
    loggedTopics: z
      .array(z.string().refine((t) => t.trim().length > 0, 'blank topic name'))
      .min(1, 'at least one topic (or "*") is required'),
    controlTopic: z.string().startsWith('/', 'must be an absolute topic name'),
    controlMessageType: z.string().min(1),
  })
  .superRefine((config, ctx) => {
    if (config.loggedTopics.length > 1 && config.loggedTopics.includes(ALL_TOPICS_WILDCARD)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['loggedTopics'],
        message: `"${ALL_TOPICS_WILDCARD}" must be the only entry`,
      });
    }
  });

export type RecorderConfig = z.infer<typeof RecorderConfigSchema>;

/** The part of the configuration a capture session needs. */
export type RecordingConfig = Pick<RecorderConfig, 'dataFolder' | 'fileDuration' | 'loggedTopics'>;

export type ConfigOverrides = Partial<RecorderConfig>;

export const DEFAULT_CONFIG: Readonly<RecorderConfig> = Object.freeze({
  dataFolder: DEFAULT_DATA_FOLDER,
  fileDuration: DEFAULT_FILE_DURATION_S,
  loggedTopics: [...DEFAULT_LOGGED_TOPICS],
  controlTopic: DEFAULT_CONTROL_TOPIC,
  controlMessageType: DEFAULT_CONTROL_MESSAGE_TYPE,
});

const ParameterMapSchema = z.record(z.unknown());

/**
 * Pull the parameter map out of a parsed YAML document. A document whose
 * values carry `ros__parameters` is treated as a ROS parameter file; the
 * first node's parameters are used.
 */
export function extractParameters(doc: unknown): Record<string, unknown> {
  if (doc === null || doc === undefined) return {};
  const parsed = ParameterMapSchema.safeParse(doc);
  if (!parsed.success) {
    throw new InvalidConfigError('Config file must contain a mapping of parameters');
  }

  for (const value of Object.values(parsed.data)) {
    const node = ParameterMapSchema.safeParse(value);
    if (node.success && 'ros__parameters' in node.data) {
      const params = ParameterMapSchema.safeParse(node.data.ros__parameters);
      if (!params.success) {
        throw new InvalidConfigError('ros__parameters must be a mapping');
      }
      return params.data;
    }
  }
  return parsed.data;
}

export function resolveConfig(
  fileParams: Record<string, unknown> = {},
  overrides: ConfigOverrides = {}
): RecorderConfig {
  const merged: Record<string, unknown> = { ...DEFAULT_CONFIG, ...fileParams };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }
  const result = RecorderConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new InvalidConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

export function loadConfig(filePath?: string, overrides: ConfigOverrides = {}): RecorderConfig {
  if (!filePath) {
    return resolveConfig({}, overrides);
  }
  if (!existsSync(filePath)) {
    throw new InvalidConfigError(`Config file not found: ${filePath}`);
  }

  let doc: unknown;
  try {
    doc = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new InvalidConfigError(`Failed to parse ${filePath}: ${errorMessage(err)}`);
  }
  return resolveConfig(extractParameters(doc), overrides);
}

