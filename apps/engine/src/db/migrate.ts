import fs from 'fs/promises';
import path from 'path';
import { Queryable } from '../repositories/task.repository';

export const SCHEMA_PATH = path.resolve(__dirname, '../../db/schema.sql');

export async function migrate(pool: Queryable, schemaPath: string = SCHEMA_PATH): Promise<void> {
    const sql = await fs.readFile(schemaPath, 'utf8');
    await pool.query(sql);
    console.log(`[db] schema applied from ${path.basename(schemaPath)}`);
}
