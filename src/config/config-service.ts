/**
 * @module config-service
 *
 * 统一配置管理服务：集中管理所有环境变量配置。
 *
 * **设计目标**：
 * - 单一数据源：所有环境配置从 ConfigService 获取，避免散落的 process.env 访问
 * - 类型安全：提供强类型配置接口，在启动时校验配置有效性
 * - 可测试性：支持测试环境下重置配置
 *
 * 核心模块（lexer / interpreter / codegen）从不读取配置；CLI 层把这里的值
 * 解析成显式的选项对象再传入。
 *
 * **使用方式**：
 * ```typescript
 * import { ConfigService } from './config/config-service.js';
 *
 * const config = ConfigService.getInstance();
 * const options = { maxTape: config.maxTape ?? undefined };
 * ```
 */

import { LogLevel } from '../utils/logger.js';
import { Diagnostics, DiagnosticError } from '../diagnostics/diagnostics.js';
import { DEFAULT_CHECK_INTERVAL, isTargetName, type TargetName } from '../types.js';

export const DEFAULT_TARGET: TargetName = 'rust';

/**
 * 配置服务单例类。
 *
 * 在首次调用 getInstance() 时初始化，从环境变量读取所有配置。
 * 配置项在实例生命周期内保持不变（只读）。
 */
export class ConfigService {
  private static instance: ConfigService | null = null;

  /** 日志级别（默认 INFO） */
  readonly logLevel: LogLevel;

  /** 纸带最大格数（默认不限制，设置 BRAINFORGE_MAX_TAPE 启用） */
  readonly maxTape: number | null;

  /** 两次协作式取消检查之间的步数 */
  readonly checkInterval: number;

  /** transpile / compile 的默认目标语言 */
  readonly target: TargetName;

  private constructor(env: NodeJS.ProcessEnv) {
    this.logLevel = this.parseLogLevel(env.LOG_LEVEL);
    this.maxTape = parseOptionalPositiveInt('BRAINFORGE_MAX_TAPE', env.BRAINFORGE_MAX_TAPE);
    this.checkInterval =
      parseOptionalPositiveInt('BRAINFORGE_CHECK_INTERVAL', env.BRAINFORGE_CHECK_INTERVAL) ?? DEFAULT_CHECK_INTERVAL;
    this.target = this.parseTarget(env.BRAINFORGE_TARGET);
  }

  /**
   * 解析 LOG_LEVEL 环境变量为 LogLevel 枚举值。
   *
   * @param raw - 原始环境变量值
   * @returns 解析后的 LogLevel，默认 INFO
   */
  private parseLogLevel(raw: string | undefined): LogLevel {
    if (!raw) return LogLevel.INFO;
    switch (raw.toUpperCase()) {
      case 'DEBUG':
        return LogLevel.DEBUG;
      case 'WARN':
        return LogLevel.WARN;
      case 'ERROR':
        return LogLevel.ERROR;
      default:
        return LogLevel.INFO;
    }
  }

  private parseTarget(raw: string | undefined): TargetName {
    if (!raw) return DEFAULT_TARGET;
    const normalized = raw.trim().toLowerCase();
    if (!isTargetName(normalized)) {
      throw new DiagnosticError(
        Diagnostics.invalidConfiguration(`BRAINFORGE_TARGET must be one of rust, c, javascript (got '${raw}')`).build()
      );
    }
    return normalized;
  }

  /**
   * 获取 ConfigService 单例实例。
   *
   * 首次调用时创建实例，后续调用返回同一实例。
   */
  static getInstance(): ConfigService {
    if (ConfigService.instance === null) {
      ConfigService.instance = new ConfigService(process.env);
    }
    return ConfigService.instance;
  }

  /**
   * 重置单例实例（仅用于测试）。
   *
   * 重置后，下次调用 getInstance() 会重新读取环境变量。
   */
  static resetForTesting(): void {
    ConfigService.instance = null;
  }
}

/**
 * 解析可选的正整数环境变量。
 *
 * @throws {DiagnosticError} C001 当值不是正整数时
 */
export function parseOptionalPositiveInt(name: string, raw: string | undefined): number | null {
  if (raw === undefined || raw.trim() === '') return null;
  const value = Number(raw.trim());
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new DiagnosticError(
      Diagnostics.invalidConfiguration(`${name} must be a positive integer (got '${raw}')`).build()
    );
  }
  return value;
}
