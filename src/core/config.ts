import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';

// 설정 인터페이스 정의
export interface Config {
  // 인덱스 설정
  serviceIndexUrl: string;
  requestTimeoutMs: number;
  cacheTtlMs: number;

  // 다운로드 설정
  downloadDir: string;
  downloadTimeoutMs: number;
  includePrerelease: boolean;
  targetFrameworks: string[];

  // 기타 설정
  logLevel: string;
}

// 기본 설정값
export const DEFAULT_CONFIG: Config = {
  serviceIndexUrl: 'https://api.nuget.org/v3/index.json',
  requestTimeoutMs: 30000,
  cacheTtlMs: 5 * 60 * 1000,
  downloadDir: './download/',
  downloadTimeoutMs: 300000,
  includePrerelease: false,
  targetFrameworks: [],
  logLevel: 'info',
};

export type ConfigKey = keyof Config;

export function isConfigKey(key: string): key is ConfigKey {
  return Object.prototype.hasOwnProperty.call(DEFAULT_CONFIG, key);
}

/**
 * 문자열 값을 설정 키의 타입에 맞게 변환
 */
export function parseConfigValue(key: ConfigKey, value: string): Config[ConfigKey] {
  const defaultValue = DEFAULT_CONFIG[key];

  if (typeof defaultValue === 'boolean') {
    if (value === 'true') return true;
    if (value === 'false') return false;
    throw new Error(`${key}는 true 또는 false여야 합니다`);
  }

  if (typeof defaultValue === 'number') {
    const parsed = Number(value);
    if (!value.trim() || isNaN(parsed) || parsed < 0) {
      throw new Error(`${key}는 0 이상의 숫자여야 합니다`);
    }
    return parsed;
  }

  if (Array.isArray(defaultValue)) {
    return value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }

  return value;
}

/**
 * 저장된 값과 기본값 병합 (타입이 맞지 않는 값은 기본값 사용)
 */
function mergeWithDefaults(raw: unknown): Config {
  const config: Config = { ...DEFAULT_CONFIG, targetFrameworks: [...DEFAULT_CONFIG.targetFrameworks] };
  if (typeof raw !== 'object' || raw === null) {
    return config;
  }

  const stored = new Map<string, unknown>(Object.entries(raw));
  const str = (key: 'serviceIndexUrl' | 'downloadDir' | 'logLevel'): void => {
    const value = stored.get(key);
    if (typeof value === 'string' && value.trim()) config[key] = value;
  };
  const num = (key: 'requestTimeoutMs' | 'cacheTtlMs' | 'downloadTimeoutMs'): void => {
    const value = stored.get(key);
    if (typeof value === 'number' && value >= 0) config[key] = value;
  };

  str('serviceIndexUrl');
  str('downloadDir');
  str('logLevel');
  num('requestTimeoutMs');
  num('cacheTtlMs');
  num('downloadTimeoutMs');

  const prerelease = stored.get('includePrerelease');
  if (typeof prerelease === 'boolean') config.includePrerelease = prerelease;

  const frameworks = stored.get('targetFrameworks');
  if (Array.isArray(frameworks)) {
    config.targetFrameworks = frameworks.filter((f): f is string => typeof f === 'string');
  }

  return config;
}

export class ConfigManager {
  private configDir: string;
  private configPath: string;
  private logsDir: string;
  private cacheDir: string;

  constructor(baseDir?: string) {
    this.configDir = baseDir ?? process.env.NUPKG_FETCH_HOME ?? path.join(os.homedir(), '.nupkg-fetch');
    this.configPath = path.join(this.configDir, 'settings.json');
    this.logsDir = path.join(this.configDir, 'logs');
    this.cacheDir = path.join(this.configDir, 'cache');
  }

  /**
   * 필요한 디렉토리들을 생성합니다.
   */
  async ensureDirectories(): Promise<void> {
    await fs.ensureDir(this.configDir);
    await fs.ensureDir(this.logsDir);
    await fs.ensureDir(this.cacheDir);
  }

  /**
   * 설정을 로드합니다. 파일이 없으면 기본값을 생성합니다.
   */
  async loadConfig(): Promise<Config> {
    await this.ensureDirectories();

    if (await fs.pathExists(this.configPath)) {
      const rawConfig: unknown = await fs.readJson(this.configPath);
      return mergeWithDefaults(rawConfig);
    }

    // 기본 설정 생성 및 저장
    return this.resetToDefaults();
  }

  /**
   * 설정을 저장합니다.
   */
  async saveConfig(config: Config): Promise<void> {
    await this.ensureDirectories();
    await fs.writeJson(this.configPath, config, { spaces: 2 });
  }

  /**
   * 설정을 기본값으로 초기화합니다.
   */
  async resetToDefaults(): Promise<Config> {
    const config = mergeWithDefaults({});
    await this.saveConfig(config);
    return config;
  }

  /**
   * 특정 설정값을 업데이트합니다.
   */
  async updateConfig(updates: Partial<Config>): Promise<Config> {
    const currentConfig = await this.loadConfig();
    const newConfig = { ...currentConfig, ...updates };
    await this.saveConfig(newConfig);
    return newConfig;
  }

  getConfigDir(): string {
    return this.configDir;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getLogsDir(): string {
    return this.logsDir;
  }

  getCacheDir(): string {
    return this.cacheDir;
  }

  /**
   * 설정을 동기적으로 로드합니다 (CLI용).
   * 파일이 없으면 기본값, 읽을 수 없는 파일이면 에러
   */
  getConfig(): Config {
    if (!fs.pathExistsSync(this.configPath)) {
      return mergeWithDefaults({});
    }
    const rawConfig: unknown = fs.readJsonSync(this.configPath);
    return mergeWithDefaults(rawConfig);
  }

  /**
   * 설정값을 동기적으로 설정합니다 (CLI용).
   */
  set(key: string, value: string): Config {
    if (!isConfigKey(key)) {
      throw new Error(`알 수 없는 설정 키: ${key}`);
    }

    const config: Record<string, unknown> = { ...this.getConfig() };
    config[key] = parseConfigValue(key, value);

    fs.ensureDirSync(this.configDir);
    fs.writeJsonSync(this.configPath, config, { spaces: 2 });
    return mergeWithDefaults(config);
  }

  /**
   * 설정을 동기적으로 초기화합니다 (CLI용).
   */
  reset(): void {
    fs.ensureDirSync(this.configDir);
    fs.writeJsonSync(this.configPath, DEFAULT_CONFIG, { spaces: 2 });
  }
}

// 싱글톤 인스턴스
let configManagerInstance: ConfigManager | null = null;

export function getConfigManager(): ConfigManager {
  if (!configManagerInstance) {
    configManagerInstance = new ConfigManager();
  }
  return configManagerInstance;
}
