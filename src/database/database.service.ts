import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import * as mysql from 'mysql2/promise';
import { AppConfigService } from '../config/config.service';
import { StorageError, errorMessage } from '../common/errors';

export type SqlValue = string | number | boolean | Date | Buffer | null;

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
    private readonly logger = new Logger(DatabaseService.name);
    private pool: mysql.Pool | null = null;

    constructor(private readonly configService: AppConfigService) {}

    async onModuleInit() {
        await this.connect();
    }

    async onModuleDestroy() {
        await this.disconnect();
    }

    async connect(): Promise<void> {
        const dbConfig = this.configService.database;

        // 커넥션 풀 생성 (JSON 컬럼은 드라이버가 객체로 파싱)
        this.pool = mysql.createPool({
            host: dbConfig.host,
            port: dbConfig.port,
            user: dbConfig.username,
            password: dbConfig.password,
            database: dbConfig.database,
            charset: dbConfig.charset,
            timezone: dbConfig.timezone,
            waitForConnections: true,
            connectionLimit: dbConfig.connectionLimit,
            queueLimit: 0,
        });

        this.logger.log(`✅ MySQL 커넥션 풀 생성: ${dbConfig.host}:${dbConfig.port}/${dbConfig.database}`);
    }

    async disconnect(): Promise<void> {
        if (!this.pool) return;
        try {
            await this.pool.end();
            this.logger.log('✅ MySQL 데이터베이스 연결이 종료되었습니다.');
        } catch (error) {
            this.logger.error(`❌ MySQL 데이터베이스 연결 종료 실패: ${errorMessage(error)}`);
        } finally {
            this.pool = null;
        }
    }

    async query(sql: string, params: SqlValue[] = []): Promise<mysql.RowDataPacket[]> {
        const pool = this.requirePool();
        try {
            const [rows] = await pool.execute<mysql.RowDataPacket[]>(sql, params);
            return rows;
        } catch (error) {
            this.logger.error(`쿼리 실행 오류: ${errorMessage(error)}`);
            throw new StorageError(errorMessage(error));
        }
    }

    async queryOne(sql: string, params: SqlValue[] = []): Promise<mysql.RowDataPacket | null> {
        const rows = await this.query(sql, params);
        return rows[0] ?? null;
    }

    async execute(sql: string, params: SqlValue[] = []): Promise<mysql.ResultSetHeader> {
        const pool = this.requirePool();
        try {
            const [res] = await pool.execute<mysql.ResultSetHeader>(sql, params);
            return res;
        } catch (error) {
            this.logger.error(`쿼리 실행 오류: ${errorMessage(error)}`);
            throw new StorageError(errorMessage(error));
        }
    }

    async healthCheck(): Promise<boolean> {
        if (!this.pool) return false;
        try {
            await this.pool.query('SELECT 1');
            return true;
        } catch (error) {
            this.logger.warn(`헬스체크 실패: ${errorMessage(error)}`);
            return false;
        }
    }

    private requirePool(): mysql.Pool {
        if (!this.pool) {
            throw new StorageError('데이터베이스 풀이 초기화되지 않았습니다.');
        }
        return this.pool;
    }
}
