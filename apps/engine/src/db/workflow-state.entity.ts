/**
 * Row shape of the workflow_states table. Columns mirror the persisted
 * state record, plus `id` (the execution id) as primary key.
 */
export const WORKFLOW_STATES_TABLE = 'workflow_states';

export const CREATE_WORKFLOW_STATES_SQL = `
CREATE TABLE IF NOT EXISTS ${WORKFLOW_STATES_TABLE} (
    id              TEXT PRIMARY KEY,
    workflow_id     TEXT NOT NULL,
    execution_id    TEXT NOT NULL,
    status          TEXT NOT NULL,
    current_step    TEXT,
    steps_completed JSONB NOT NULL DEFAULT '[]'::jsonb,
    steps_remaining JSONB NOT NULL DEFAULT '[]'::jsonb,
    progress        DOUBLE PRECISION NOT NULL DEFAULT 0,
    data            JSONB NOT NULL DEFAULT '{}'::jsonb,
    error           TEXT,
    created_at      TIMESTAMPTZ NOT NULL,
    updated_at      TIMESTAMPTZ NOT NULL,
    metadata        JSONB NOT NULL DEFAULT '{}'::jsonb
);
CREATE INDEX IF NOT EXISTS idx_workflow_states_workflow_id ON ${WORKFLOW_STATES_TABLE} (workflow_id);
CREATE INDEX IF NOT EXISTS idx_workflow_states_created_at ON ${WORKFLOW_STATES_TABLE} (created_at);
`;

export const STATE_COLUMNS = [
    'workflow_id',
    'execution_id',
    'status',
    'current_step',
    'steps_completed',
    'steps_remaining',
    'progress',
    'data',
    'error',
    'created_at',
    'updated_at',
    'metadata',
] as const;

export const UPSERT_STATE_SQL = `
INSERT INTO ${WORKFLOW_STATES_TABLE} (id, ${STATE_COLUMNS.join(', ')})
VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)
ON CONFLICT (id) DO UPDATE SET
    ${STATE_COLUMNS.map(c => `${c} = EXCLUDED.${c}`).join(',\n    ')}`;

export const SELECT_STATE_SQL = `SELECT * FROM ${WORKFLOW_STATES_TABLE} WHERE id = $1`;

export const SELECT_STATE_FOR_UPDATE_SQL = `${SELECT_STATE_SQL} FOR UPDATE`;

export const SELECT_ALL_STATES_SQL = `SELECT * FROM ${WORKFLOW_STATES_TABLE} ORDER BY created_at ASC`;

export const DELETE_STATE_SQL = `DELETE FROM ${WORKFLOW_STATES_TABLE} WHERE id = $1`;

export const DELETE_EXPIRED_STATES_SQL = `
DELETE FROM ${WORKFLOW_STATES_TABLE}
WHERE created_at <= $1
RETURNING id`;
