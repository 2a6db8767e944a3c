import * as fs from 'fs';
import * as path from 'path';
import * as mysql from 'mysql2/promise';

interface DatabaseConfig {
    host: string;
    port: number;
    user: string;
    password: string;
    database: string;
}

const SCHEMA_FILE = path.join(__dirname, '..', 'sql', 'structure_practice.sql');

// .env 파일 읽기
function loadEnvFile(): Record<string, string> {
    const envPath = path.join(__dirname, '..', '.env');

    if (!fs.existsSync(envPath)) {
        console.error('❌ .env 파일을 찾을 수 없습니다.');
        console.error('.env.example 파일을 복사하여 .env 파일을 생성하고 설정을 입력해주세요.');
        process.exit(1);
    }

    const env: Record<string, string> = {};
    fs.readFileSync(envPath, 'utf8')
        .split('\n')
        .forEach((line) => {
            const trimmedLine = line.trim();
            if (trimmedLine && !trimmedLine.startsWith('#')) {
                const [key, ...valueParts] = trimmedLine.split('=');
                if (key && valueParts.length > 0) {
                    env[key.trim()] = valueParts.join('=').trim();
                }
            }
        });

    return env;
}

// 스키마 파일의 DB 이름을 설정값으로 치환
export function renderSchema(sqlContent: string, database: string): string {
    return sqlContent
        .replace(/USE\s+`[^`]+`;/g, `USE \`${database}\`;`)
        .replace(/CREATE DATABASE IF NOT EXISTS\s+`[^`]+`/g, `CREATE DATABASE IF NOT EXISTS \`${database}\``);
}

export function tableNames(sqlContent: string): string[] {
    return [...sqlContent.matchAll(/CREATE TABLE(?: IF NOT EXISTS)?\s+`([^`]+)`/gi)].map((m) => m[1]);
}

class DatabaseInitializer {
    constructor(private readonly config: DatabaseConfig) {}

    private connect(): Promise<mysql.Connection> {
        // DB 생성 전이므로 database 없이 접속
        return mysql.createConnection({
            host: this.config.host,
            port: this.config.port,
            user: this.config.user,
            password: this.config.password,
            multipleStatements: true,
        });
    }

    async dropDatabase(connection: mysql.Connection): Promise<void> {
        await connection.query(`DROP DATABASE IF EXISTS \`${this.config.database}\``);
        console.log(`✅ 데이터베이스 '${this.config.database}' 삭제 완료`);
    }

    async importSchema(connection: mysql.Connection): Promise<void> {
        if (!fs.existsSync(SCHEMA_FILE)) {
            throw new Error(`SQL 파일을 찾을 수 없습니다: ${SCHEMA_FILE}`);
        }

        const sqlContent = renderSchema(fs.readFileSync(SCHEMA_FILE, 'utf8'), this.config.database);
        const tables = tableNames(sqlContent);
        console.log(`📊 총 ${tables.length}개의 테이블을 생성합니다: ${tables.join(', ')}`);

        await connection.query(sqlContent);
        console.log('✅ 스키마 import 완료');
    }

    async run(reset: boolean): Promise<void> {
        console.log(reset ? '🔄 데이터베이스 리셋 시작...\n' : '🚀 데이터베이스 초기화 시작...\n');

        const connection = await this.connect();
        console.log('✅ MySQL 연결 성공');
        try {
            if (reset) await this.dropDatabase(connection);
            await this.importSchema(connection);
        } finally {
            await connection.end();
        }

        console.log(reset ? '\n🎉 데이터베이스 리셋 완료!' : '\n🎉 데이터베이스 초기화 완료!');
        console.log(`📊 데이터베이스: ${this.config.database}`);
        console.log(`🌐 호스트: ${this.config.host}:${this.config.port}`);
    }
}

// .env 파일에서 설정 로드
function loadConfig(): DatabaseConfig {
    console.log('📝 .env 파일에서 설정을 로드하는 중...');
    const env = loadEnvFile();

    return {
        host: env.DB_HOST || 'localhost',
        port: parseInt(env.DB_PORT || '3306', 10),
        user: env.DB_USERNAME || 'root',
        password: env.DB_PASSWORD || '',
        database: env.DB_DATABASE || 'structure_practice',
    };
}

// 스크립트 실행
if (require.main === module) {
    const initializer = new DatabaseInitializer(loadConfig());
    const isReset = process.argv.slice(2).includes('--reset');

    initializer.run(isReset).catch((error: unknown) => {
        console.error('❌ 데이터베이스 초기화 실패:', error);
        process.exit(1);
    });
}

export type { DatabaseConfig };
export { DatabaseInitializer };
