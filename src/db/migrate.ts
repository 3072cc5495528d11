import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import type { Logger } from 'pino';

function stripOuterTransactions(sql: string): string {
    return sql
        .replace(/\bBEGIN(?:\s+TRANSACTION)?\s*;?/gi, "")
        .replace(/\bCOMMIT\s*;?/gi, "");
}

export function resolveMigrationsDir(): string {
    const beside = path.resolve(__dirname, 'migrations');
    if (fs.existsSync(beside)) return beside;
    // compiled output does not carry the .sql files
    return path.resolve('src/db/migrations');
}

/**
 * Apply every `*.sql` file in `dir` not yet recorded in `_migrations`, in
 * file-name order. Each file runs under its own savepoint.
 */
export function migrateLedgerDb(db: Database.Database, log: Logger, dir: string = resolveMigrationsDir()): string[] {
    db.exec("CREATE TABLE IF NOT EXISTS _migrations(name TEXT PRIMARY KEY, applied_at INTEGER NOT NULL);");
    const applied = new Set(
        (db.prepare('SELECT name FROM _migrations').all() as { name: string }[]).map((r) => r.name),
    );

    if (!fs.existsSync(dir)) {
        throw new Error(`migrations directory missing: ${dir}`);
    }
    const files = fs.readdirSync(dir).filter((f) => f.endsWith('.sql')).sort();
    const ran: string[] = [];

    for (const file of files) {
        if (applied.has(file)) continue;
        const sql = stripOuterTransactions(fs.readFileSync(path.join(dir, file), 'utf8')).trim();
        const spName = `mig_${file.replace(/[^a-zA-Z0-9]/g, '_')}`;
        db.exec(`SAVEPOINT ${spName};`);
        try {
            db.exec(sql);
            db.prepare("INSERT INTO _migrations(name, applied_at) VALUES (?, strftime('%s','now'))").run(file);
            db.exec(`RELEASE ${spName};`);
            log.info({ file }, 'migrate_ledger');
            ran.push(file);
        } catch (e) {
            db.exec(`ROLLBACK TO ${spName};`);
            db.exec(`RELEASE ${spName};`);
            log.error({ file, error: String(e), sqlPreview: sql.substring(0, 200) }, 'migrate_ledger_error');
            throw e;
        }
    }
    return ran;
}
