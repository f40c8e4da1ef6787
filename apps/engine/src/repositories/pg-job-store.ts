import { readFile } from 'fs/promises';
import path from 'path';
import { Pool } from 'pg';
import { JsonEnvelope, fromJsonEnvelope, toJsonEnvelope } from '@batchline/sdk';
import {
    JobArgs,
    JobEntity,
    JobErrorRecord,
    JobState,
    RetryPolicy,
    isJobPriority,
    isJobState,
} from '../db/job.entity';
import { GroupState, JobGroupEntity } from '../db/job-group.entity';
import { JobStore, PendingRecords, collectPending } from './job-store';

const SCHEMA_PATH = path.resolve(__dirname, '../../sql/schema.sql');
const TERMINAL = [JobState.COMPLETED, JobState.FAILED, JobState.CANCELED];

export type JobRow = {
    id: string;
    name: string;
    task_name: string;
    args: JsonEnvelope | null;
    priority: string;
    dependencies: string[];
    state: string;
    retry_policy: RetryPolicy;
    attempt_count: number;
    result: JsonEnvelope | null;
    error: JobErrorRecord | null;
    last_error: JobErrorRecord | null;
    group_id: string | null;
    tags: string[];
    metadata: JsonEnvelope | null;
    timeout_ms: number | null;
    progress: number;
    progress_message: string;
    retry_at: Date | null;
    created_at: Date;
    queued_at: Date | null;
    started_at: Date | null;
    finished_at: Date | null;
    updated_at: Date;
};

export type GroupRow = {
    id: string;
    name: string;
    description: string;
    sequential: boolean;
    cancel_on_failure: boolean;
    member_ids: string[];
    canceled: boolean;
    state: string;
    metadata: JsonEnvelope | null;
    created_at: Date;
    updated_at: Date;
    finished_at: Date | null;
};

const JOB_COLUMNS = [
    'id', 'name', 'task_name', 'args', 'priority', 'dependencies', 'state', 'retry_policy',
    'attempt_count', 'result', 'error', 'last_error', 'group_id', 'tags', 'metadata', 'timeout_ms',
    'progress', 'progress_message', 'retry_at', 'created_at', 'queued_at', 'started_at',
    'finished_at', 'updated_at',
];

const GROUP_COLUMNS = [
    'id', 'name', 'description', 'sequential', 'cancel_on_failure', 'member_ids', 'canceled',
    'state', 'metadata', 'created_at', 'updated_at', 'finished_at',
];

function upsertSql(table: string, columns: string[]): string {
    const placeholders = columns.map((_, i) => `$${i + 1}`).join(', ');
    const updates = columns
        .filter(c => c !== 'id')
        .map(c => `${c} = EXCLUDED.${c}`)
        .join(', ');
    return `INSERT INTO ${table} (${columns.join(', ')}) VALUES (${placeholders}) ON CONFLICT (id) DO UPDATE SET ${updates}`;
}

export const UPSERT_JOB = upsertSql('jobs', JOB_COLUMNS);
export const UPSERT_GROUP = upsertSql('job_groups', GROUP_COLUMNS);

function json(value: unknown): string | null {
    return value === null || value === undefined ? null : JSON.stringify(value);
}

/**
 * Postgres-backed store: one row per job in `jobs`, one per group in `job_groups`.
 * Opaque payloads (args, result, metadata) are stored as superjson envelopes.
 */
export class PgJobStore implements JobStore {
    constructor(private readonly pool: Pool) { }

    async ensureSchema(): Promise<void> {
        const ddl = await readFile(SCHEMA_PATH, 'utf-8');
        await this.pool.query(ddl);
    }

    async saveJob(job: JobEntity): Promise<void> {
        await this.pool.query(UPSERT_JOB, jobParams(job));
    }

    async saveGroup(group: JobGroupEntity): Promise<void> {
        await this.pool.query(UPSERT_GROUP, groupParams(group));
    }

    async loadJob(id: string): Promise<JobEntity | null> {
        const res = await this.pool.query<JobRow>('SELECT * FROM jobs WHERE id = $1', [id]);
        const row = res.rows[0];
        return row ? rowToJob(row) : null;
    }

    async loadGroup(id: string): Promise<JobGroupEntity | null> {
        const res = await this.pool.query<GroupRow>('SELECT * FROM job_groups WHERE id = $1', [id]);
        const row = res.rows[0];
        return row ? rowToGroup(row) : null;
    }

    async loadAllPending(): Promise<PendingRecords> {
        const jobs = await this.pool.query<JobRow>(
            'SELECT * FROM jobs WHERE state <> ALL($1::text[]) ORDER BY created_at ASC',
            [TERMINAL],
        );
        const groups = await this.pool.query<GroupRow>(
            'SELECT * FROM job_groups WHERE finished_at IS NULL ORDER BY created_at ASC',
        );
        return collectPending(jobs.rows.map(rowToJob), groups.rows.map(rowToGroup));
    }

    async ping(): Promise<void> {
        await this.pool.query('SELECT 1');
    }

    async close(): Promise<void> {
        await this.pool.end();
    }
}

export function rowToJob(row: JobRow): JobEntity {
    if (!isJobState(row.state)) {
        throw new Error(`Job ${row.id} has unknown state "${row.state}"`);
    }
    if (!isJobPriority(row.priority)) {
        throw new Error(`Job ${row.id} has unknown priority "${row.priority}"`);
    }
    return {
        id: row.id,
        name: row.name,
        taskName: row.task_name,
        args: fromJsonEnvelope<JobArgs>(row.args) ?? [],
        priority: row.priority,
        dependencies: row.dependencies ?? [],
        state: row.state,
        retryPolicy: row.retry_policy,
        attemptCount: row.attempt_count,
        result: fromJsonEnvelope<unknown>(row.result) ?? null,
        error: row.error,
        lastError: row.last_error,
        groupId: row.group_id,
        tags: row.tags ?? [],
        metadata: fromJsonEnvelope<Record<string, unknown>>(row.metadata) ?? {},
        timeoutMs: row.timeout_ms,
        progress: row.progress,
        progressMessage: row.progress_message,
        retryAt: row.retry_at,
        createdAt: row.created_at,
        queuedAt: row.queued_at,
        startedAt: row.started_at,
        finishedAt: row.finished_at,
        updatedAt: row.updated_at,
    };
}

export function rowToGroup(row: GroupRow): JobGroupEntity {
    const state = Object.values(GroupState).find(s => s === row.state);
    if (!state) {
        throw new Error(`Group ${row.id} has unknown state "${row.state}"`);
    }
    return {
        id: row.id,
        name: row.name,
        description: row.description,
        sequential: row.sequential,
        cancelOnFailure: row.cancel_on_failure,
        memberIds: row.member_ids ?? [],
        canceled: row.canceled,
        state,
        metadata: fromJsonEnvelope<Record<string, unknown>>(row.metadata) ?? {},
        createdAt: row.created_at,
        updatedAt: row.updated_at,
        finishedAt: row.finished_at,
    };
}

// Parameter order follows JOB_COLUMNS.
export function jobParams(job: JobEntity): unknown[] {
    return [
        job.id,
        job.name,
        job.taskName,
        json(toJsonEnvelope(job.args)),
        job.priority,
        job.dependencies,
        job.state,
        json(job.retryPolicy),
        job.attemptCount,
        json(toJsonEnvelope(job.result)),
        json(job.error),
        json(job.lastError),
        job.groupId,
        job.tags,
        json(toJsonEnvelope(job.metadata)),
        job.timeoutMs,
        job.progress,
        job.progressMessage,
        job.retryAt,
        job.createdAt,
        job.queuedAt,
        job.startedAt,
        job.finishedAt,
        job.updatedAt,
    ];
}

// Parameter order follows GROUP_COLUMNS.
export function groupParams(group: JobGroupEntity): unknown[] {
    return [
        group.id,
        group.name,
        group.description,
        group.sequential,
        group.cancelOnFailure,
        group.memberIds,
        group.canceled,
        group.state,
        json(toJsonEnvelope(group.metadata)),
        group.createdAt,
        group.updatedAt,
        group.finishedAt,
    ];
}
