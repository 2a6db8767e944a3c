import { Injectable, Logger } from '@nestjs/common';
import { TranscriptionError, errorMessage } from '../../common/errors';
import { countWords } from '../../common/text';
import { AudioUpload, OpenAIService, TranscribeOutput } from '../openai/openai.service';

export interface TranscriptionResult {
    text: string;
    wordCount: number;
    durationSeconds: number | null;
    model: string;
    latencyMs: number;
}

@Injectable()
export class TranscriptionService {
    private readonly logger = new Logger(TranscriptionService.name);

    constructor(private readonly openai: OpenAIService) {}

    /** 전사 실패나 빈 결과는 모두 TranscriptionError */
    async transcribe(audio: AudioUpload, language?: string): Promise<TranscriptionResult> {
        if (audio.buffer.length === 0) {
            throw new TranscriptionError('audio file is empty');
        }

        const started = Date.now();
        let output: TranscribeOutput;
        try {
            output = await this.openai.transcribe(audio, { language });
        } catch (error) {
            this.logger.error(`🎙️ 전사 실패 (${audio.filename}): ${errorMessage(error)}`);
            throw new TranscriptionError(errorMessage(error));
        }
        const latencyMs = Date.now() - started;

        const text = output.text.trim();
        if (!text) {
            this.logger.warn(`🎙️ 전사 결과가 비어 있음 (${audio.filename})`);
            throw new TranscriptionError('transcript is empty');
        }

        this.logger.log(
            `🎙️ 전사 완료: model=${output.model}, ${latencyMs}ms, duration=${output.durationSeconds ?? '?'}s`,
        );
        return {
            text,
            wordCount: countWords(text),
            durationSeconds: output.durationSeconds,
            model: output.model,
            latencyMs,
        };
    }
}
