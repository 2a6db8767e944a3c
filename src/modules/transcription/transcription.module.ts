import { Module } from '@nestjs/common';
import { OpenAIModule } from '../openai/openai.module';
import { TranscriptionService } from './transcription.service';

@Module({
    imports: [OpenAIModule],
    providers: [TranscriptionService],
    exports: [TranscriptionService],
})
export class TranscriptionModule {}
