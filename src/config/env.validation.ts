// src/config/env.validation.ts
import { plainToInstance, Transform } from 'class-transformer';
import { IsIn, IsInt, IsOptional, IsString, Max, Min, validateSync } from 'class-validator';

const toInt = ({ value }: { value: unknown }) =>
    typeof value === 'string' && value.trim() !== '' ? parseInt(value, 10) : value;

class EnvironmentVariables {
    // 서버 설정
    @IsOptional()
    @Transform(toInt)
    @IsInt()
    @Min(1)
    @Max(65535)
    PORT?: number;

    @IsOptional()
    @IsIn(['development', 'production', 'test'])
    NODE_ENV?: string;

    @IsOptional()
    @IsString()
    CORS_ORIGINS?: string;

    // 데이터베이스 설정
    @IsOptional()
    @IsString()
    DB_HOST?: string;

    @IsOptional()
    @Transform(toInt)
    @IsInt()
    DB_PORT?: number;

    @IsOptional()
    @IsString()
    DB_USERNAME?: string;

    @IsOptional()
    @IsString()
    DB_PASSWORD?: string;

    @IsOptional()
    @IsString()
    DB_DATABASE?: string;

    @IsOptional()
    @Transform(toInt)
    @IsInt()
    @Min(1)
    DB_CONNECTION_LIMIT?: number;

    // OpenAI 설정 (비어 있으면 생성형 협력자는 폴백 경로로 동작)
    @IsOptional()
    @IsString()
    OPENAI_API_KEY?: string;

    @IsOptional()
    @IsString()
    OPENAI_MODEL?: string;

    @IsOptional()
    @IsString()
    TRANSCRIPTION_MODEL?: string;

    @IsOptional()
    @Transform(toInt)
    @IsInt()
    @Min(1000)
    OPENAI_TIMEOUT_MS?: number;

    // 분석 차원별 타임아웃
    @IsOptional()
    @Transform(toInt)
    @IsInt()
    @Min(100)
    ANALYSIS_TIMEOUT_MS?: number;

    // 리포트 모델 채점 타임아웃
    @IsOptional()
    @Transform(toInt)
    @IsInt()
    @Min(100)
    REPORT_SCORING_TIMEOUT_MS?: number;
}

export function validate(config: Record<string, unknown>) {
    const validatedConfig = plainToInstance(EnvironmentVariables, config, {
        enableImplicitConversion: true,
    });

    const errors = validateSync(validatedConfig, {
        skipMissingProperties: false,
    });

    if (errors.length > 0) {
        throw new Error(errors.toString());
    }

    return validatedConfig;
}
