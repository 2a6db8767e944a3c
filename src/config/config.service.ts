// src/config/config.service.ts
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export interface DatabaseConfig {
    host: string;
    port: number;
    username: string;
    password: string;
    database: string;
    charset: string;
    timezone: string;
    connectionLimit: number;
}

export interface OpenAIConfig {
    apiKey: string;
    model: string;
    transcriptionModel: string;
    timeoutMs: number;
}

export interface AnalysisConfig {
    perKindTimeoutMs: number;
}

export interface ReportConfig {
    scoringTimeoutMs: number;
}

@Injectable()
export class AppConfigService {
    constructor(private configService: ConfigService) {}

    // 서버 설정
    get port(): number {
        return this.configService.get<number>('app.port') || 4000;
    }

    get nodeEnv(): string {
        return this.configService.get<string>('app.nodeEnv') || 'development';
    }

    get corsOrigins(): string[] {
        return this.configService.get<string[]>('app.corsOrigins') || [];
    }

    // 데이터베이스 설정
    get database(): DatabaseConfig {
        return (
            this.configService.get<DatabaseConfig>('app.database') || {
                host: 'localhost',
                port: 3306,
                username: 'root',
                password: '',
                database: 'structure_practice',
                charset: 'utf8mb4',
                timezone: 'Z',
                connectionLimit: 10,
            }
        );
    }

    // OpenAI 설정
    get openai(): OpenAIConfig {
        return (
            this.configService.get<OpenAIConfig>('app.openai') || {
                apiKey: '',
                model: 'gpt-4o-mini',
                transcriptionModel: 'whisper-1',
                timeoutMs: 60000,
            }
        );
    }

    // 분석 설정
    get analysis(): AnalysisConfig {
        return (
            this.configService.get<AnalysisConfig>('app.analysis') || { perKindTimeoutMs: 30000 }
        );
    }

    // 리포트 설정
    get report(): ReportConfig {
        return this.configService.get<ReportConfig>('app.report') || { scoringTimeoutMs: 45000 };
    }
}
