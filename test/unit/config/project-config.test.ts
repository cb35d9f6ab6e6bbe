import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { ConfigService } from '../../../src/config/config-service.js';
import {
  PROJECT_CONFIG_FILE,
  loadProjectConfig,
  resolveSettings,
  validateProjectConfig,
} from '../../../src/config/project-config.js';
import { DiagnosticCode, DiagnosticError } from '../../../src/diagnostics/diagnostics.js';
import { DEFAULT_CHECK_INTERVAL } from '../../../src/types.js';
import { withTempDir } from '../../helpers/fixtures.js';

const ENV_KEYS = ['BRAINFORGE_MAX_TAPE', 'BRAINFORGE_CHECK_INTERVAL', 'BRAINFORGE_TARGET'];

const ORIGINAL_ENV: Record<string, string | undefined> = Object.fromEntries(
  ENV_KEYS.map((key) => [key, process.env[key]])
);

function restoreEnv(): void {
  for (const key of ENV_KEYS) {
    const value = ORIGINAL_ENV[key];
    if (typeof value === 'undefined') {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
}

function configError(fn: () => unknown): string {
  try {
    fn();
  } catch (error) {
    assert.ok(error instanceof DiagnosticError);
    assert.equal(error.code, DiagnosticCode.C001_InvalidConfiguration);
    return error.message;
  }
  assert.fail('应该抛出 C001');
}

describe('项目配置', () => {
  describe('validateProjectConfig', () => {
    it('接受合法配置', () => {
      const config = { target: 'c', maxTape: 30000, checkInterval: 1024 };
      assert.deepEqual(validateProjectConfig(config), config);
    });

    it('接受空对象与 $schema 字段', () => {
      assert.deepEqual(validateProjectConfig({}), {});
      assert.deepEqual(validateProjectConfig({ $schema: './brainforge.config.schema.json' }), {
        $schema: './brainforge.config.schema.json',
      });
    });

    it('未知目标列出可选值', () => {
      assert.equal(
        configError(() => validateProjectConfig({ target: 'cobol' }, 'cfg.json')),
        'cfg.json: /target: must be one of rust, c, javascript'
      );
    });

    it('拒绝未知字段', () => {
      assert.equal(
        configError(() => validateProjectConfig({ extra: true })),
        `${PROJECT_CONFIG_FILE}: /: unknown property 'extra'`
      );
    });

    it('数值必须是正整数', () => {
      assert.equal(configError(() => validateProjectConfig({ maxTape: 0 }, 'cfg.json')), 'cfg.json: /maxTape: must be >= 1');
      assert.equal(
        configError(() => validateProjectConfig({ checkInterval: 1.5 }, 'cfg.json')),
        'cfg.json: /checkInterval: must be integer'
      );
    });

    it('一次列出全部问题', () => {
      assert.equal(
        configError(() => validateProjectConfig({ maxTape: 0, target: 'go' }, 'cfg.json')),
        'cfg.json: /target: must be one of rust, c, javascript; /maxTape: must be >= 1'
      );
    });

    it('拒绝非对象', () => {
      assert.equal(configError(() => validateProjectConfig([], 'cfg.json')), 'cfg.json: /: must be object');
    });
  });

  describe('loadProjectConfig', () => {
    it('默认文件不存在时返回空配置', async () => {
      await withTempDir(dir => {
        assert.deepEqual(loadProjectConfig(undefined, dir), {});
      });
    });

    it('读取工作目录下的默认文件', async () => {
      await withTempDir(dir => {
        writeFileSync(join(dir, PROJECT_CONFIG_FILE), JSON.stringify({ target: 'javascript' }));
        assert.deepEqual(loadProjectConfig(undefined, dir), { target: 'javascript' });
      });
    });

    it('显式路径相对于工作目录解析', async () => {
      await withTempDir(dir => {
        mkdirSync(join(dir, 'conf'));
        writeFileSync(join(dir, 'conf', 'bf.json'), JSON.stringify({ maxTape: 8 }));
        assert.deepEqual(loadProjectConfig('conf/bf.json', dir), { maxTape: 8 });
      });
    });

    it('显式文件不存在时报错', async () => {
      await withTempDir(dir => {
        const message = configError(() => loadProjectConfig('missing.json', dir));
        assert.equal(message, `Configuration file not found: ${join(dir, 'missing.json')}`);
      });
    });

    it('JSON 无法解析时报错', async () => {
      await withTempDir(dir => {
        const path = join(dir, PROJECT_CONFIG_FILE);
        writeFileSync(path, '{ "target": ');
        const message = configError(() => loadProjectConfig(undefined, dir));
        assert.ok(message.startsWith(`${path}: invalid JSON (`));
      });
    });

    it('校验错误以文件路径开头', async () => {
      await withTempDir(dir => {
        const path = join(dir, PROJECT_CONFIG_FILE);
        writeFileSync(path, JSON.stringify({ maxTape: -1 }));
        assert.equal(configError(() => loadProjectConfig(undefined, dir)), `${path}: /maxTape: must be >= 1`);
      });
    });
  });

  describe('resolveSettings', () => {
    beforeEach(() => {
      for (const key of ENV_KEYS) {
        delete process.env[key];
      }
      ConfigService.resetForTesting();
    });

    afterEach(() => {
      restoreEnv();
      ConfigService.resetForTesting();
    });

    it('全部缺省时使用环境默认值', () => {
      assert.deepEqual(resolveSettings({}, {}), {
        target: 'rust',
        maxTape: undefined,
        checkInterval: DEFAULT_CHECK_INTERVAL,
      });
    });

    it('配置文件覆盖环境变量', () => {
      process.env.BRAINFORGE_TARGET = 'c';
      process.env.BRAINFORGE_MAX_TAPE = '100';
      assert.deepEqual(resolveSettings({}, { target: 'javascript' }), {
        target: 'javascript',
        maxTape: 100,
        checkInterval: DEFAULT_CHECK_INTERVAL,
      });
    });

    it('命令行参数优先级最高', () => {
      process.env.BRAINFORGE_CHECK_INTERVAL = '50';
      const settings = resolveSettings({ maxTape: 4, checkInterval: 7 }, { maxTape: 9, checkInterval: 8 });
      assert.equal(settings.maxTape, 4);
      assert.equal(settings.checkInterval, 7);
    });
  });
});
