import { SqlClient, SqlDatabase } from './index';

/**
 * Runs a callback inside BEGIN/COMMIT on a dedicated client, rolling back
 * when the callback throws.
 */
export class TransactionManager {
    constructor(private db: SqlDatabase) { }

    /**
     * @example
     * await txManager.run(async (client) => {
     *   const res = await client.query(SELECT_STATE_FOR_UPDATE_SQL, [id]);
     *   await client.query(UPSERT_STATE_SQL, params);
     * });
     */
    async run<T>(callback: (client: SqlClient) => Promise<T>): Promise<T> {
        const client = await this.db.connect();

        try {
            await client.query('BEGIN');
            const result = await callback(client);
            await client.query('COMMIT');
            return result;
        } catch (e) {
            await client.query('ROLLBACK');
            throw e;
        } finally {
            client.release();
        }
    }
}
