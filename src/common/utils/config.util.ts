import type { ConfigService } from '@nestjs/config';

// Coerce config values to finite numbers
export function toNumber(value: unknown, defaultValue: number): number {
  if (value === undefined || value === null || value === '') {
    return defaultValue;
  }
  const n = Number(value);
  return Number.isFinite(n) ? n : defaultValue;
}

export function getNumber(
  configService: ConfigService,
  key: string,
  defaultValue: number,
): number {
  return toNumber(configService.get<unknown>(key), defaultValue);
}

export function getPositiveInt(
  configService: ConfigService,
  key: string,
  defaultValue: number,
): number {
  return Math.max(1, Math.floor(getNumber(configService, key, defaultValue)));
}

/**
 * Read a comma separated list, dropping blank entries.
 */
export function getList(
  configService: ConfigService,
  key: string,
  defaultValue: string[],
): string[] {
  const raw = configService.get<string>(key);
  if (!raw) {
    return defaultValue;
  }
  const items = raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : defaultValue;
}
