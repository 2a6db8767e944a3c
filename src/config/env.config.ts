// src/config/env.config.ts
import { registerAs } from '@nestjs/config';

export default registerAs('app', () => ({
    // 서버 설정
    port: parseInt(process.env.PORT || '4000', 10),
    nodeEnv: process.env.NODE_ENV || 'development',
    corsOrigins: (process.env.CORS_ORIGINS || 'http://localhost:3000')
        .split(',')
        .map((o) => o.trim())
        .filter(Boolean),

    // 데이터베이스 설정
    database: {
        host: process.env.DB_HOST || 'localhost',
        port: parseInt(process.env.DB_PORT || '3306', 10),
        username: process.env.DB_USERNAME || 'root',
        password: process.env.DB_PASSWORD || '',
        database: process.env.DB_DATABASE || 'structure_practice',
        charset: process.env.DB_CHARSET || 'utf8mb4',
        timezone: process.env.DB_TIMEZONE || 'Z',
        connectionLimit: parseInt(process.env.DB_CONNECTION_LIMIT || '10', 10),
    },

    // OpenAI 설정
    openai: {
        apiKey: process.env.OPENAI_API_KEY || '',
        model: process.env.OPENAI_MODEL || 'gpt-4o-mini',
        transcriptionModel: process.env.TRANSCRIPTION_MODEL || 'whisper-1',
        timeoutMs: parseInt(process.env.OPENAI_TIMEOUT_MS || '60000', 10),
    },

    // 분석 설정 (차원별 타임아웃)
    analysis: {
        perKindTimeoutMs: parseInt(process.env.ANALYSIS_TIMEOUT_MS || '30000', 10),
    },

    // 리포트 설정 (모델 채점 대기 한도, 넘으면 휴리스틱)
    report: {
        scoringTimeoutMs: parseInt(process.env.REPORT_SCORING_TIMEOUT_MS || '45000', 10),
    },
}));
