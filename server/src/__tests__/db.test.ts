import { describe, it, expect, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { SqliteGateway } from '../../../src/db/sqliteGateway.js';
import { Ledger } from '../../../src/domain/ledger.js';
import { DEFAULT_RATE_CONFIG } from '../../../src/domain/types.js';
import { openDatabase } from '../db.js';

const dirs: string[] = [];

function tempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'hours-ledger-'));
  dirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of dirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('openDatabase', () => {
  it('creates missing directories and a usable database', async () => {
    const dbPath = path.join(tempDir(), 'nested', 'ledger.db');
    const db = openDatabase(dbPath);

    const gateway = new SqliteGateway(db);
    expect(await gateway.saveRateConfig({ baseRate: 10, includeTips: false, avgTipRate: 1 })).toEqual({ ok: true });
    db.close();

    const reopened = openDatabase(dbPath);
    expect((await new SqliteGateway(reopened).loadAll()).rateConfig.baseRate).toBe(10);
    reopened.close();
  });

  it('moves aside a file that is not a database', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const dbPath = path.join(tempDir(), 'ledger.db');
    fs.writeFileSync(dbPath, 'not a database '.repeat(300));

    const db = openDatabase(dbPath);

    expect(fs.existsSync(`${dbPath}.corrupt`)).toBe(true);
    expect((await new SqliteGateway(db).loadAll()).periods).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
    db.close();
    warn.mockRestore();
  });

  it('moves aside a database whose pages are damaged', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const dbPath = path.join(tempDir(), 'ledger.db');
    const db = openDatabase(dbPath);
    await new SqliteGateway(db).saveRateConfig({ baseRate: 12, includeTips: false, avgTipRate: 1 });
    db.close();

    // Keep the 100-byte file header, overwrite the rest of page 1 (the schema table)
    const fd = fs.openSync(dbPath, 'r+');
    fs.writeSync(fd, Buffer.alloc(3996, 0xff), 0, 3996, 100);
    fs.closeSync(fd);

    const reopened = openDatabase(dbPath);
    const ledger = await Ledger.load(new SqliteGateway(reopened));

    expect(fs.existsSync(`${dbPath}.corrupt`)).toBe(true);
    expect(ledger.periods()).toEqual([]);
    expect(ledger.rateConfig()).toEqual(DEFAULT_RATE_CONFIG);
    expect(warn).toHaveBeenCalledTimes(1);
    reopened.close();
    warn.mockRestore();
  });
});
