import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { isValidVersion } from '@shared/version';

const installedVersionSchema = z.object({
  version: z.string().refine(isValidVersion),
  installedAt: z.string().datetime(),
  previousVersion: z.string().nullable()
});

export type InstalledVersionRecord = z.infer<typeof installedVersionSchema>;

/** `version.json`: ultima versao verificada; fallback quando o binario nao reporta versao. */
export class InstalledVersionStore {
  constructor(
    private readonly filePath: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  get(): InstalledVersionRecord | null {
    if (!fs.existsSync(this.filePath)) {
      return null;
    }

    try {
      const parsed = installedVersionSchema.safeParse(JSON.parse(fs.readFileSync(this.filePath, 'utf-8')));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }

  set(version: string, previousVersion: string | null): InstalledVersionRecord {
    const record: InstalledVersionRecord = {
      version,
      installedAt: this.now().toISOString(),
      previousVersion
    };
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const pending = `${this.filePath}.tmp-${process.pid}`;
    fs.writeFileSync(pending, `${JSON.stringify(record, null, 2)}\n`, 'utf-8');
    fs.renameSync(pending, this.filePath);
    return record;
  }
}
