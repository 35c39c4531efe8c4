import dotenv from 'dotenv';
import * as path from 'path';

export interface AppConfig {
  port: number;
  configDir: string;
  photoFolderPath: string;
  captureTimeoutSeconds: number;
  previewLastPhoto: boolean;
  placeholderImagePath: string;
  logFilePath: string | null;
  photoFilePrefix: string;
  captureCommand: string;
  captureCommandTimeoutMs: number;
  foregroundCommands: string[];
  pollIntervalMs: number;
}

type Env = Record<string, string | undefined>;

const parseInteger = (value: string | undefined, fallback: number): number => {
  if (value === undefined || !/^\s*[+-]?\d+\s*$/.test(value)) {
    return fallback;
  }
  return parseInt(value, 10);
};

const parsePositiveInteger = (value: string | undefined, fallback: number): number => {
  const parsed = parseInteger(value, fallback);
  return parsed > 0 ? parsed : fallback;
};

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
};

/**
 * Resolve the photo folder setting.
 *
 * `default` maps to `<cwd>/photos`, a leading `//` makes the rest of the
 * setting relative to the directory holding the config file, and anything
 * else is taken as a (possibly relative) path.
 */
export const resolvePhotoFolderPath = (
  setting: string,
  configDir: string,
  cwd: string = process.cwd()
): string => {
  const trimmed = setting.trim();
  if (trimmed === '' || trimmed === 'default') {
    return path.join(cwd, 'photos');
  }
  if (trimmed.startsWith('//')) {
    return path.join(configDir, trimmed.replace(/^\/+/, ''));
  }
  return path.resolve(cwd, trimmed);
};

export const loadConfig = (env: Env, configFilePath: string): AppConfig => {
  const configDir = path.dirname(path.resolve(configFilePath));
  const logFileSetting = env.LOG_FILE_PATH;

  return {
    port: parsePositiveInteger(env.PORT, 8080),
    configDir,
    photoFolderPath: resolvePhotoFolderPath(env.PHOTO_FOLDER_PATH || 'default', configDir),
    captureTimeoutSeconds: parsePositiveInteger(env.CAPTURE_TIMEOUT_SECONDS, 60),
    previewLastPhoto: parseBoolean(env.PREVIEW_LAST_PHOTO, false),
    placeholderImagePath: path.resolve(
      configDir,
      env.PLACEHOLDER_IMAGE_PATH || 'placeholder.jpg'
    ),
    // An explicitly empty LOG_FILE_PATH turns file logging off
    logFilePath:
      logFileSetting === undefined
        ? path.join(configDir, 'shutterlink.log')
        : logFileSetting.trim() === ''
          ? null
          : path.resolve(configDir, logFileSetting.trim()),
    photoFilePrefix: (env.PHOTO_FILE_PREFIX || 'shutterlink').trim(),
    captureCommand: (env.CAPTURE_COMMAND || '').trim(),
    captureCommandTimeoutMs: parsePositiveInteger(env.CAPTURE_COMMAND_TIMEOUT_MS, 15000),
    foregroundCommands: (env.FOREGROUND_COMMANDS || '')
      .split(';')
      .map((command) => command.trim())
      .filter((command) => command.length > 0),
    pollIntervalMs: parsePositiveInteger(env.POLL_INTERVAL_MS, 200),
  };
};

const configFilePath = path.resolve(process.env.CONFIG_FILE || '.env');

dotenv.config({ path: configFilePath });

export const config = loadConfig(process.env, configFilePath);
