import { promises as fs } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { deserialize, serialize } from '@batchline/sdk';
import { JobEntity } from '../db/job.entity';
import { JobGroupEntity } from '../db/job-group.entity';
import { JobStore, PendingRecords, collectPending } from './job-store';

const TAG = '[store:file]';
const ID_PATTERN = /^[a-zA-Z0-9_-]+$/;

type RecordKind = 'jobs' | 'groups';

/**
 * One superjson document per record:
 *   <dataDir>/jobs/<id>.json
 *   <dataDir>/groups/<id>.json
 * Each save writes a temp file and renames it over the previous record.
 */
export class FileJobStore implements JobStore {
    private initialized: Promise<void> | null = null;

    constructor(private readonly dataDir: string) { }

    init(): Promise<void> {
        if (!this.initialized) {
            this.initialized = Promise.all([
                fs.mkdir(this.dir('jobs'), { recursive: true }),
                fs.mkdir(this.dir('groups'), { recursive: true }),
            ]).then(() => {
                console.log(`${TAG} using ${path.resolve(this.dataDir)}`);
            });
        }
        return this.initialized;
    }

    async saveJob(job: JobEntity): Promise<void> {
        await this.write('jobs', job.id, serialize(job));
    }

    async saveGroup(group: JobGroupEntity): Promise<void> {
        await this.write('groups', group.id, serialize(group));
    }

    async loadJob(id: string): Promise<JobEntity | null> {
        return this.read<JobEntity>('jobs', id);
    }

    async loadGroup(id: string): Promise<JobGroupEntity | null> {
        return this.read<JobGroupEntity>('groups', id);
    }

    async loadAllPending(): Promise<PendingRecords> {
        const [jobs, groups] = await Promise.all([
            this.readAll<JobEntity>('jobs'),
            this.readAll<JobGroupEntity>('groups'),
        ]);
        return collectPending(jobs, groups);
    }

    async ping(): Promise<void> {
        await this.init();
        await fs.access(this.dir('jobs'));
    }

    async close(): Promise<void> { }

    private dir(kind: RecordKind): string {
        return path.join(this.dataDir, kind);
    }

    private file(kind: RecordKind, id: string): string {
        if (!ID_PATTERN.test(id)) {
            throw new Error(`Invalid record id "${id}"`);
        }
        return path.join(this.dir(kind), `${id}.json`);
    }

    private async write(kind: RecordKind, id: string, body: string): Promise<void> {
        await this.init();
        const target = this.file(kind, id);
        const tmp = `${target}.${randomUUID()}.tmp`;
        try {
            await fs.writeFile(tmp, body, 'utf-8');
            await fs.rename(tmp, target);
        } catch (err) {
            await fs.rm(tmp, { force: true });
            throw err;
        }
    }

    private async read<T>(kind: RecordKind, id: string): Promise<T | null> {
        await this.init();
        try {
            const body = await fs.readFile(this.file(kind, id), 'utf-8');
            return deserialize<T>(body) ?? null;
        } catch (err) {
            if (isMissingFile(err)) return null;
            throw err;
        }
    }

    private async readAll<T>(kind: RecordKind): Promise<T[]> {
        await this.init();
        const names = await fs.readdir(this.dir(kind));
        const records: T[] = [];
        for (const name of names) {
            if (!name.endsWith('.json')) continue;
            const record = await this.read<T>(kind, name.slice(0, -'.json'.length));
            if (record) records.push(record);
        }
        return records;
    }
}

function isMissingFile(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
