/**
 * brainforge.config.json 项目配置文件
 *
 * 负责读取、解析和验证项目配置，并与环境配置、命令行参数合并。
 * 优先级：命令行参数 > 配置文件 > 环境变量。
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import AjvModule, { type AnySchemaObject, type ErrorObject, type ValidateFunction } from 'ajv';
import { DiagnosticError, Diagnostics } from '../diagnostics/diagnostics.js';
import type { TargetName } from '../types.js';
import { ConfigService } from './config-service.js';

export const PROJECT_CONFIG_FILE = 'brainforge.config.json';
const SCHEMA_FILE = 'brainforge.config.schema.json';

export interface ProjectConfig {
  readonly target?: TargetName;
  readonly maxTape?: number;
  readonly checkInterval?: number;
}

/** 一次命令执行最终采用的设置 */
export interface ResolvedSettings {
  readonly target: TargetName;
  readonly maxTape: number | undefined;
  readonly checkInterval: number;
}

/**
 * schema 文件不会被编译进 dist，因此从当前模块所在目录逐级向上查找。
 * 源码运行（src/config）与编译产物（dist/src/config）都能找到项目根目录下的文件。
 */
function locateSchema(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = join(dir, SCHEMA_FILE);
    if (existsSync(candidate)) return candidate;
    const parent = dirname(dir);
    if (parent === dir) {
      throw new Error(`Cannot locate ${SCHEMA_FILE} above ${fileURLToPath(import.meta.url)}`);
    }
    dir = parent;
  }
}

let validator: ValidateFunction<ProjectConfig> | null = null;

function getValidator(): ValidateFunction<ProjectConfig> {
  if (validator === null) {
    const schema: unknown = JSON.parse(readFileSync(locateSchema(), 'utf-8'));
    if (!isSchemaObject(schema)) {
      throw new Error(`${SCHEMA_FILE} must contain a JSON object`);
    }
    const ajv = new AjvModule.default({ strict: true, allErrors: true });
    validator = ajv.compile<ProjectConfig>(schema);
  }
  return validator;
}

/**
 * 校验已解析的配置对象。
 *
 * @throws {DiagnosticError} C001 列出全部校验错误
 */
export function validateProjectConfig(data: unknown, origin = PROJECT_CONFIG_FILE): ProjectConfig {
  const validate = getValidator();
  if (validate(data)) {
    return data;
  }
  const problems = (validate.errors ?? []).map(error => describeAjvError(error));
  throw new DiagnosticError(Diagnostics.invalidConfiguration(`${origin}: ${problems.join('; ')}`).build());
}

/**
 * 读取项目配置。
 *
 * 未显式指定路径时在 cwd 下查找 brainforge.config.json，找不到返回空配置；
 * 显式指定的文件不存在则报错。
 *
 * @throws {DiagnosticError} C001 文件缺失、JSON 无法解析或校验失败
 */
export function loadProjectConfig(explicitPath?: string, cwd: string = process.cwd()): ProjectConfig {
  const path = resolve(cwd, explicitPath ?? PROJECT_CONFIG_FILE);
  if (!existsSync(path)) {
    if (explicitPath === undefined) return {};
    throw new DiagnosticError(Diagnostics.invalidConfiguration(`Configuration file not found: ${path}`).build());
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new DiagnosticError(Diagnostics.invalidConfiguration(`${path}: invalid JSON (${message})`).build());
  }
  return validateProjectConfig(data, path);
}

/**
 * 合并命令行参数、项目配置与环境配置。
 */
export function resolveSettings(
  flags: ProjectConfig,
  project: ProjectConfig,
  env: ConfigService = ConfigService.getInstance(),
): ResolvedSettings {
  return {
    target: flags.target ?? project.target ?? env.target,
    maxTape: flags.maxTape ?? project.maxTape ?? env.maxTape ?? undefined,
    checkInterval: flags.checkInterval ?? project.checkInterval ?? env.checkInterval,
  };
}

function isSchemaObject(value: unknown): value is AnySchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeAjvError(error: ErrorObject): string {
  const field = error.instancePath || '/';
  switch (error.keyword) {
    case 'additionalProperties': {
      const extra: unknown = error.params['additionalProperty'];
      return `${field}: unknown property '${String(extra)}'`;
    }
    case 'enum': {
      const allowed: unknown = error.params['allowedValues'];
      return `${field}: must be one of ${Array.isArray(allowed) ? allowed.join(', ') : String(allowed)}`;
    }
    default:
      return `${field}: ${error.message ?? 'is invalid'}`;
  }
}
