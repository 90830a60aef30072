import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import type { ProgressEvent } from '@shared/contracts';
import { DUMP_TARGETS, DumpService, findDumpTargets } from '@main/services/dump/DumpService';

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function createTempDir(prefix: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function writeSource(root: string, relativePath: string, content: string): void {
  const target = path.join(root, relativePath);
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, content);
}

describe('DumpService', () => {
  it('expoe os seis alvos fixos na ordem de exibicao', () => {
    expect(DUMP_TARGETS.map((target) => target.key)).toEqual([
      'firm0_enc.bak',
      'firm1_enc.bak',
      'bios7i_part1.bin',
      'bios9i_part1.bin',
      'boot9.bin',
      'boot11.bin'
    ]);
    expect(DUMP_TARGETS[4]?.sourcePath).toBe('3ds/boot9.bin');
  });

  it('filtra alvos por chave ignorando chaves desconhecidas', () => {
    expect(findDumpTargets(['boot11.bin', 'nao-existe', 'firm0_enc.bak']).map((target) => target.key)).toEqual([
      'firm0_enc.bak',
      'boot11.bin'
    ]);
  });

  it('copia um arquivo e reporta o destino', async () => {
    const root = createTempDir('3dse-sd-');
    const destination = path.join(createTempDir('3dse-dumps-'), 'novo');
    writeSource(root, '3ds/boot9.bin', 'conteudo-boot9');
    const [target] = findDumpTargets(['boot9.bin']);
    if (!target) {
      throw new Error('alvo boot9.bin ausente');
    }

    const events: ProgressEvent[] = [];
    const result = await new DumpService(createLogger()).dumpFile(root, target, destination, (event) =>
      events.push(event)
    );

    const copied = path.join(destination, 'boot9.bin');
    expect(result).toMatchObject({
      ok: true,
      errorCode: null,
      destinationPath: copied,
      message: `Arquivo 'boot9.bin' copiado para '${copied}'.`
    });
    expect(fs.readFileSync(copied, 'utf-8')).toBe('conteudo-boot9');
    expect(events.map((event) => [event.severity, event.percent])).toEqual([
      ['info', 0],
      ['success', 100]
    ]);
  });

  it('retorna source_not_found quando o arquivo nao existe no cartao', async () => {
    const root = createTempDir('3dse-sd-');
    const destination = createTempDir('3dse-dumps-');
    const [target] = findDumpTargets(['firm0_enc.bak']);
    if (!target) {
      throw new Error('alvo firm0_enc.bak ausente');
    }
    const logger = createLogger();

    const result = await new DumpService(logger).dumpFile(root, target, destination);

    const expectedSource = path.join(root, 'boot9strap/firm0_enc.bak');
    expect(result).toMatchObject({
      ok: false,
      errorCode: 'source_not_found',
      destinationPath: null,
      message: `Arquivo de origem '${expectedSource}' nao encontrado no cartao SD.`
    });
    expect(fs.readdirSync(destination)).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(
      'dump.file.failed',
      expect.objectContaining({ key: 'firm0_enc.bak', errorCode: 'source_not_found' })
    );
  });

  it('continua o lote apos uma falha e resume 2 de 3 com aviso', async () => {
    const root = createTempDir('3dse-sd-');
    const destination = createTempDir('3dse-dumps-');
    writeSource(root, 'boot9strap/firm0_enc.bak', 'firm0');
    writeSource(root, '3ds/boot11.bin', 'boot11');
    const targets = findDumpTargets(['firm0_enc.bak', 'bios7i_part1.bin', 'boot11.bin']);

    const events: ProgressEvent[] = [];
    const result = await new DumpService(createLogger()).dumpBatch(root, targets, destination, (event) =>
      events.push(event)
    );

    expect(result.total).toBe(3);
    expect(result.succeeded).toBe(2);
    expect(result.results.map((item) => [item.target.key, item.ok])).toEqual([
      ['firm0_enc.bak', true],
      ['bios7i_part1.bin', false],
      ['boot11.bin', true]
    ]);
    expect(result.results[1]?.errorCode).toBe('source_not_found');
    expect(fs.readFileSync(path.join(destination, 'firm0_enc.bak'), 'utf-8')).toBe('firm0');
    expect(fs.readFileSync(path.join(destination, 'boot11.bin'), 'utf-8')).toBe('boot11');
    expect(fs.existsSync(path.join(destination, 'bios7i_part1.bin'))).toBe(false);

    expect(events.map((event) => [event.severity, event.percent])).toEqual([
      ['info', 16],
      ['info', 33],
      ['info', 50],
      ['error', 66],
      ['info', 83],
      ['info', 100],
      ['warning', 100]
    ]);
    expect(events.at(-1)?.message).toBe('2 de 3 arquivos copiados.');
  });

  it('marca o resumo como erro quando nenhum arquivo e copiado', async () => {
    const root = createTempDir('3dse-sd-');
    const destination = createTempDir('3dse-dumps-');
    const events: ProgressEvent[] = [];

    const result = await new DumpService(createLogger()).dumpBatch(
      root,
      findDumpTargets(['boot9.bin']),
      destination,
      (event) => events.push(event)
    );

    expect(result.succeeded).toBe(0);
    expect(events.at(-1)).toMatchObject({ severity: 'error', percent: 100, message: '0 de 1 arquivos copiados.' });
  });

  it('marca o resumo como sucesso quando todos sao copiados', async () => {
    const root = createTempDir('3dse-sd-');
    const destination = createTempDir('3dse-dumps-');
    writeSource(root, '_nds/bios9i_part1.bin', 'bios9i');
    const events: ProgressEvent[] = [];

    await new DumpService(createLogger()).dumpBatch(root, findDumpTargets(['bios9i_part1.bin']), destination, (event) =>
      events.push(event)
    );

    expect(events.at(-1)).toMatchObject({ severity: 'success', percent: 100, message: '1 de 1 arquivos copiados.' });
  });
});
