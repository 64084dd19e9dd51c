import fs from 'node:fs';
import path from 'node:path';
import { ConfigError } from '../errors.js';
import type { CameraProfile, ProcessingErrorPolicy } from '../types.js';

export type RawCameraConfig = {
  id: string;
  event_video_prefix: string;
  scale: number;
  skip_first_n_secs: number;
  max_length_secs: number;
};

/** The bridge document exactly as it appears on disk. */
export type RawBridgeConfig = {
  mqtt_server: string;
  mqtt_port: number;
  mqtt_user: string;
  mqtt_pwd: string;
  mqtt_client_id?: string;
  mqtt_base_events_topic: string;
  mqtt_base_gifs_topic: string;
  ffmpeg_working_folder: string;
  ffmpeg_path?: string;
  zoneminder_events_video_folder: string;
  zoneminder_cameras: RawCameraConfig[];
  reconnect_interval_secs?: number;
  max_concurrent_jobs?: number;
  max_pending_jobs?: number;
  on_processing_error?: ProcessingErrorPolicy;
  search_previous_day?: boolean;
};

export type BrokerConfig = {
  host: string;
  port: number;
  username: string;
  password: string;
  clientId?: string;
};

export type TopicsConfig = {
  eventsBase: string;
  gifsBase: string;
};

export type BridgeConfig = {
  broker: BrokerConfig;
  topics: TopicsConfig;
  workingFolder: string;
  sourceVideoFolder: string;
  ffmpegPath: string;
  cameras: CameraProfile[];
  reconnectIntervalMs: number;
  maxConcurrentJobs: number;
  maxPendingJobs: number;
  onProcessingError: ProcessingErrorPolicy;
  searchPreviousDay: boolean;
};

export const DEFAULT_RECONNECT_INTERVAL_SECS = 10;
export const DEFAULT_MAX_CONCURRENT_JOBS = 1;
export const DEFAULT_MAX_PENDING_JOBS = 32;

type JsonType = 'object' | 'number' | 'integer' | 'string' | 'boolean' | 'array';

type JsonSchema = {
  type: JsonType;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: false;
  items?: JsonSchema;
  enum?: (string | number | boolean)[];
  minimum?: number;
  maximum?: number;
  exclusiveMinimum?: number;
  minLength?: number;
};

const cameraSchema: JsonSchema = {
  type: 'object',
  required: ['id', 'event_video_prefix', 'scale', 'skip_first_n_secs', 'max_length_secs'],
  additionalProperties: false,
  properties: {
    id: { type: 'string', minLength: 1 },
    event_video_prefix: { type: 'string' },
    scale: { type: 'integer', minimum: 1, maximum: 7680 },
    skip_first_n_secs: { type: 'integer', minimum: 0 },
    max_length_secs: { type: 'number', exclusiveMinimum: 0 }
  }
};

const bridgeConfigSchema: JsonSchema = {
  type: 'object',
  required: [
    'mqtt_server',
    'mqtt_port',
    'mqtt_user',
    'mqtt_pwd',
    'mqtt_base_events_topic',
    'mqtt_base_gifs_topic',
    'ffmpeg_working_folder',
    'zoneminder_events_video_folder',
    'zoneminder_cameras'
  ],
  additionalProperties: false,
  properties: {
    mqtt_server: { type: 'string', minLength: 1 },
    mqtt_port: { type: 'integer', minimum: 1, maximum: 65535 },
    mqtt_user: { type: 'string' },
    mqtt_pwd: { type: 'string' },
    mqtt_client_id: { type: 'string', minLength: 1 },
    mqtt_base_events_topic: { type: 'string', minLength: 1 },
    mqtt_base_gifs_topic: { type: 'string', minLength: 1 },
    ffmpeg_working_folder: { type: 'string', minLength: 1 },
    ffmpeg_path: { type: 'string', minLength: 1 },
    zoneminder_events_video_folder: { type: 'string', minLength: 1 },
    zoneminder_cameras: { type: 'array', items: cameraSchema },
    reconnect_interval_secs: { type: 'number', minimum: 1 },
    max_concurrent_jobs: { type: 'integer', minimum: 1 },
    max_pending_jobs: { type: 'integer', minimum: 1 },
    on_processing_error: { type: 'string', enum: ['drop', 'reconnect'] },
    search_previous_day: { type: 'boolean' }
  }
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const { type } = schema;
  const errors: string[] = [];

  if (type === 'object') {
    if (!isRecord(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    for (const key of schema.required ?? []) {
      if (!(key in value)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    if (schema.additionalProperties === false) {
      const definedProperties = new Set(Object.keys(schema.properties ?? {}));
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (!(key in value)) {
        continue;
      }
      errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
    }

    return errors;
  }

  if (type === 'array') {
    if (!Array.isArray(value)) {
      errors.push(`${pathLabel} must be an array`);
      return errors;
    }

    const items = schema.items;
    if (items) {
      value.forEach((item: unknown, index) => {
        errors.push(...validateAgainstSchema(items, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number' || type === 'integer') {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (type === 'integer' && !Number.isInteger(value)) {
      errors.push(`${pathLabel} must be an integer`);
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    if (typeof schema.exclusiveMinimum === 'number' && value <= schema.exclusiveMinimum) {
      errors.push(`${pathLabel} must be > ${schema.exclusiveMinimum}`);
    }

    if (typeof schema.maximum === 'number' && value > schema.maximum) {
      errors.push(`${pathLabel} must be <= ${schema.maximum}`);
    }

    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
      return errors;
    }

    if (typeof schema.minLength === 'number' && value.trim().length < schema.minLength) {
      errors.push(`${pathLabel} must not be empty`);
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (type === 'boolean') {
    if (typeof value !== 'boolean') {
      errors.push(`${pathLabel} must be a boolean`);
    }
    return errors;
  }

  return errors;
}

function isRawBridgeConfig(value: unknown): value is RawBridgeConfig {
  return validateAgainstSchema(bridgeConfigSchema, value, 'config').length === 0;
}

export function validateConfig(config: unknown): asserts config is RawBridgeConfig {
  const errors = validateAgainstSchema(bridgeConfigSchema, config, 'config');
  if (errors.length > 0 || !isRawBridgeConfig(config)) {
    throw new ConfigError(errors);
  }
  validateLogicalConfig(config);
}

function validateLogicalConfig(config: RawBridgeConfig) {
  const messages: string[] = [];

  if (config.zoneminder_cameras.length === 0) {
    messages.push('config.zoneminder_cameras must define at least one camera');
  }

  const cameraIds = new Map<string, number>();
  config.zoneminder_cameras.forEach((camera, index) => {
    if (camera.id.includes('/') || camera.id.includes('+') || camera.id.includes('#')) {
      messages.push(
        `config.zoneminder_cameras[${index}].id "${camera.id}" must not contain topic separators or wildcards`
      );
    }
    const existing = cameraIds.get(camera.id);
    if (typeof existing === 'number') {
      messages.push(
        `config.zoneminder_cameras[${index}] duplicates camera id "${camera.id}" already used by config.zoneminder_cameras[${existing}]`
      );
    } else {
      cameraIds.set(camera.id, index);
    }
  });

  for (const key of ['mqtt_base_events_topic', 'mqtt_base_gifs_topic'] as const) {
    const topic = config[key];
    if (/[+#]/.test(topic)) {
      messages.push(`config.${key} must not contain MQTT wildcards`);
    }
    if (topic.endsWith('/')) {
      messages.push(`config.${key} must not end with "/"`);
    }
  }

  if (config.mqtt_base_events_topic === config.mqtt_base_gifs_topic) {
    messages.push('config.mqtt_base_gifs_topic must differ from config.mqtt_base_events_topic');
  }

  if (messages.length > 0) {
    throw new ConfigError(messages);
  }
}

export function normalizeConfig(raw: RawBridgeConfig): BridgeConfig {
  return {
    broker: {
      host: raw.mqtt_server.trim(),
      port: raw.mqtt_port,
      username: raw.mqtt_user,
      password: raw.mqtt_pwd,
      clientId: raw.mqtt_client_id
    },
    topics: {
      eventsBase: raw.mqtt_base_events_topic,
      gifsBase: raw.mqtt_base_gifs_topic
    },
    workingFolder: path.resolve(raw.ffmpeg_working_folder),
    sourceVideoFolder: path.resolve(raw.zoneminder_events_video_folder),
    ffmpegPath: raw.ffmpeg_path ?? 'ffmpeg',
    cameras: raw.zoneminder_cameras.map(camera =>
      Object.freeze({
        id: camera.id,
        eventVideoPrefix: camera.event_video_prefix,
        scale: camera.scale,
        skipFirstNSecs: camera.skip_first_n_secs,
        maxLengthSecs: camera.max_length_secs
      })
    ),
    reconnectIntervalMs: Math.round((raw.reconnect_interval_secs ?? DEFAULT_RECONNECT_INTERVAL_SECS) * 1000),
    maxConcurrentJobs: raw.max_concurrent_jobs ?? DEFAULT_MAX_CONCURRENT_JOBS,
    maxPendingJobs: raw.max_pending_jobs ?? DEFAULT_MAX_PENDING_JOBS,
    onProcessingError: raw.on_processing_error ?? 'reconnect',
    searchPreviousDay: raw.search_previous_day ?? false
  };
}

export function parseConfig(contents: string): BridgeConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`Failed to parse configuration: ${message}`]);
  }

  validateConfig(parsed);
  return Object.freeze(normalizeConfig(parsed));
}

export function loadConfigFromFile(filePath: string): BridgeConfig {
  const resolvedPath = path.resolve(filePath);
  let contents: string;
  try {
    contents = fs.readFileSync(resolvedPath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`Failed to read configuration ${resolvedPath}: ${message}`]);
  }
  return parseConfig(contents);
}

