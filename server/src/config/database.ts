import { Pool } from 'pg';
import { env } from './env';

const pool = new Pool({
    connectionString: env.DATABASE_URL,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
});

pool.on('connect', () => {
    console.log('✅ Connected to PostgreSQL database');
});

// Idle clients can fail on their own; the pool discards them and keeps serving
pool.on('error', (err) => {
    console.error('❌ Unexpected database error:', err);
});

export default pool;
