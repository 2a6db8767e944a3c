import { Injectable, Logger } from '@nestjs/common';
import OpenAI from 'openai';
import { toFile } from 'openai/uploads';
import { z } from 'zod';
import { AppConfigService } from '../../config/config.service';

export type ChatMessage = { role: 'system' | 'user' | 'assistant'; content: string };

export interface ChatOptions {
    temperature?: number;
    signal?: AbortSignal;
}

export interface AudioUpload {
    buffer: Buffer;
    filename: string;
    mimetype?: string;
}

export interface TranscribeOptions {
    language?: string;
    signal?: AbortSignal;
}

export interface TranscribeOutput {
    text: string;
    durationSeconds: number | null;
    model: string;
}

// API 키가 없으면 생성형 호출 전체가 이 오류로 실패 → 호출자는 폴백 경로 사용
export class OpenAIUnavailableError extends Error {
    constructor() {
        super('OpenAI API key is not configured');
        this.name = 'OpenAIUnavailableError';
    }
}

// verbose_json 응답은 SDK 버전마다 타입이 달라서 런타임에 검증
const VerboseTranscriptionSchema = z.object({
    text: z.string(),
    duration: z
        .union([z.number(), z.string()])
        .optional()
        .transform((v) => {
            const n = typeof v === 'string' ? Number(v) : v;
            return n != null && Number.isFinite(n) ? n : null;
        }),
});

@Injectable()
export class OpenAIService {
    private readonly logger = new Logger(OpenAIService.name);
    private readonly client: OpenAI | null;

    constructor(private readonly configService: AppConfigService) {
        const { apiKey, timeoutMs } = this.configService.openai;
        this.client = apiKey ? new OpenAI({ apiKey, timeout: timeoutMs, maxRetries: 2 }) : null;
        this.logger.log(`OpenAI 초기화: apiKey set=${apiKey ? 'yes' : 'no'}, len=${apiKey.length}`);
    }

    get isAvailable(): boolean {
        return this.client !== null;
    }

    get model(): string {
        return this.configService.openai.model;
    }

    // JSON 모드 호출 + Zod 검증 (형식 위반 시 예외)
    async chatJson<S extends z.ZodTypeAny>(
        schema: S,
        messages: ChatMessage[],
        options: ChatOptions = {},
    ): Promise<z.output<S>> {
        const client = this.requireClient();
        const res = await client.chat.completions.create(
            {
                model: this.model,
                messages,
                temperature: options.temperature ?? 0.3,
                response_format: { type: 'json_object' },
            },
            { signal: options.signal },
        );
        const content = res.choices[0]?.message?.content ?? '{}';
        const parsed = schema.safeParse(safeJsonParse(content));
        if (!parsed.success) {
            throw new Error(`AI 응답 JSON 형식 오류: ${parsed.error.message}`);
        }
        return parsed.data;
    }

    async transcribe(audio: AudioUpload, options: TranscribeOptions = {}): Promise<TranscribeOutput> {
        const client = this.requireClient();
        const model = this.configService.openai.transcriptionModel;

        // Buffer를 OpenAI SDK가 기대하는 Web File로 변환
        const webFile = await toFile(audio.buffer, audio.filename || 'audio.webm', {
            type: audio.mimetype || 'audio/webm',
        });

        const res = await client.audio.transcriptions.create(
            {
                file: webFile,
                model,
                language: options.language,
                response_format: 'verbose_json',
            },
            { signal: options.signal },
        );

        const parsed = VerboseTranscriptionSchema.safeParse(res);
        if (!parsed.success) {
            throw new Error(`전사 응답 형식 오류: ${parsed.error.message}`);
        }
        return { text: parsed.data.text, durationSeconds: parsed.data.duration, model };
    }

    private requireClient(): OpenAI {
        if (!this.client) throw new OpenAIUnavailableError();
        return this.client;
    }
}

export function safeJsonParse(text: string): unknown {
    // 코드블록으로 감싼 응답도 허용
    const cleaned = text
        .trim()
        .replace(/^```(?:json)?\s*/i, '')
        .replace(/```\s*$/, '')
        .trim();
    try {
        const value: unknown = JSON.parse(cleaned);
        return value;
    } catch {
        throw new Error('AI 응답 JSON 파싱 실패');
    }
}
