import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { PasswordItem } from '../src/shared/types';

export function makeTempDir(prefix = 'credvault-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

let nextId = 1;

/** 构造内存中的条目快照，未给出的字段为空 */
export function makeItem(overrides: Partial<PasswordItem> = {}): PasswordItem {
  return {
    id: nextId++,
    site_name: '',
    url: '',
    login_account: '',
    password: 'test-secret',
    phone: '',
    email: '',
    category: '',
    notes: '',
    register_date: '2024-01-02',
    created_at: '2024-01-02T08:00:00.000Z',
    updated_at: '2024-01-02T08:00:00.000Z',
    is_deleted: false,
    deleted_at: null,
    custom_fields: {},
    ...overrides,
  };
}
