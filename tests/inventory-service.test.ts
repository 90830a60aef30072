import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { InventoryService } from '@main/services/inventory/InventoryService';

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function createSdCard(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), '3dse-inventory-'));
  tempDirs.push(dir);
  return dir;
}

function createService() {
  return new InventoryService({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() });
}

describe('InventoryService.readLumaVersion', () => {
  it('le a versao da primeira linha do config.ini', async () => {
    const root = createSdCard();
    fs.mkdirSync(path.join(root, 'luma'));
    fs.writeFileSync(path.join(root, 'luma', 'config.ini'), '; Luma3DS v13.1.2 configuration file\n\n[boot]\nversion = v99.0.0\n');

    const result = await createService().readLumaVersion(root);

    expect(result).toEqual({ component: 'luma', version: '13.1.2', error: null });
  });

  it('aponta o drive ausente antes de qualquer outra coisa', async () => {
    const root = path.join(createSdCard(), 'nao-existe');

    const result = await createService().readLumaVersion(root);

    expect(result.version).toBeNull();
    expect(result.error).toMatchObject({ code: 'not_found', missing: 'device' });
  });

  it('aponta o diretorio ausente, nao o arquivo, quando luma/ nao existe', async () => {
    const root = createSdCard();

    const result = await createService().readLumaVersion(root);

    expect(result.error).toMatchObject({ code: 'not_found', missing: 'directory' });
    expect(result.error?.message).toBe(`Diretorio 'luma' nao encontrado em '${root}'.`);
  });

  it('aponta o arquivo ausente quando so falta config.ini', async () => {
    const root = createSdCard();
    fs.mkdirSync(path.join(root, 'luma'));

    const result = await createService().readLumaVersion(root);

    expect(result.error).toMatchObject({ code: 'not_found', missing: 'file' });
  });

  it('retorna format_error quando a primeira linha nao tem versao', async () => {
    const root = createSdCard();
    fs.mkdirSync(path.join(root, 'luma'));
    fs.writeFileSync(path.join(root, 'luma', 'config.ini'), '[boot]\n; v13.1.2 na segunda linha\n');

    const result = await createService().readLumaVersion(root);

    expect(result.version).toBeNull();
    expect(result.error).toMatchObject({ code: 'format_error', missing: null });
  });

  it('aceita final de linha CRLF', async () => {
    const root = createSdCard();
    fs.mkdirSync(path.join(root, 'luma'));
    fs.writeFileSync(path.join(root, 'luma', 'config.ini'), '; v10.2.1\r\n[boot]\r\n');

    const result = await createService().readLumaVersion(root);

    expect(result.version).toBe('10.2.1');
  });
});

describe('InventoryService.checkGodMode9', () => {
  it('reporta instalado quando o payload existe', () => {
    const root = createSdCard();
    fs.mkdirSync(path.join(root, 'luma', 'payloads'), { recursive: true });
    fs.writeFileSync(path.join(root, 'luma', 'payloads', 'GodMode9.firm'), 'firm');

    expect(createService().checkGodMode9(root)).toEqual({ component: 'godmode9', presence: 'installed', error: null });
  });

  it('trata arquivo ausente como not_found suave', () => {
    const root = createSdCard();
    fs.mkdirSync(path.join(root, 'luma', 'payloads'), { recursive: true });

    const result = createService().checkGodMode9(root);

    expect(result.presence).toBe('not_found');
    expect(result.error).toMatchObject({ code: 'not_found', missing: 'file' });
  });

  it('reporta erro quando luma/payloads nao existe', () => {
    const root = createSdCard();
    fs.mkdirSync(path.join(root, 'luma'));

    const result = createService().checkGodMode9(root);

    expect(result.presence).toBe('error');
    expect(result.error).toMatchObject({ missing: 'directory' });
  });

  it('reporta erro quando o drive nao existe', () => {
    const result = createService().checkGodMode9(path.join(createSdCard(), 'sumiu'));

    expect(result.presence).toBe('error');
    expect(result.error).toMatchObject({ missing: 'device' });
  });
});
