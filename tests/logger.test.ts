import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { Logger } from '@main/services/logging/Logger';

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function createBaseDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), '3dse-logs-'));
  tempDirs.push(dir);
  return dir;
}

describe('Logger', () => {
  it('grava linhas JSON em logs/3dse.log', () => {
    const dir = createBaseDir();
    const logger = new Logger(dir);

    logger.info('status.check.start', { deviceRoot: '/media/sd' });
    logger.warn('dump.file.failed');

    expect(logger.path).toBe(path.join(dir, 'logs', '3dse.log'));
    const lines = fs.readFileSync(logger.path, 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({
      level: 'info',
      message: 'status.check.start',
      meta: { deviceRoot: '/media/sd' }
    });
    expect(logger.entries().map((entry) => [entry.level, entry.message])).toEqual([
      ['info', 'status.check.start'],
      ['warn', 'dump.file.failed']
    ]);
  });

  it('rotaciona o arquivo ao atingir o limite', () => {
    const dir = createBaseDir();
    const logger = new Logger(dir, { maxBytes: 10 });

    logger.info('primeira');
    logger.info('segunda');

    expect(fs.existsSync(`${logger.path}.1`)).toBe(true);
    expect(logger.entries().map((entry) => entry.message)).toEqual(['primeira', 'segunda']);
    expect(logger.entries(1).map((entry) => entry.message)).toEqual(['segunda']);
  });

  it('espelha as linhas no arquivo de debug', () => {
    const dir = createBaseDir();
    const mirror = path.join(dir, 'mirror', 'debug.log');
    const logger = new Logger(dir, { mirrorFilePath: mirror });

    logger.error('update.luma.failed', { errorCode: 'network_error' });

    expect(fs.readFileSync(mirror, 'utf-8')).toBe(fs.readFileSync(logger.path, 'utf-8'));
  });

  it('le linhas que nao sao JSON como mensagens info', () => {
    const dir = createBaseDir();
    const logger = new Logger(dir);
    fs.writeFileSync(logger.path, 'linha solta\n', 'utf-8');

    expect(logger.entries()).toMatchObject([{ level: 'info', message: 'linha solta' }]);
  });
});
