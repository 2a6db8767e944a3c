import { Module } from '@nestjs/common';
import { DatabaseModule } from '../../database/database.module';
import { FrameworkModule } from '../framework/framework.module';
import { OpenAIModule } from '../openai/openai.module';
import { TranscriptionModule } from '../transcription/transcription.module';
import { PracticeController } from './practice.controller';
import { PracticeService } from './practice.service';
import { StructureHintService } from './services/structure-hint.service';
import { MysqlPracticeStore } from './stores/mysql-practice.store';
import { MysqlSectionAnswerStore } from './stores/mysql-section-answer.store';
import { PracticeStore } from './stores/practice.store';
import { SectionAnswerStore } from './stores/section-answer.store';

@Module({
    imports: [DatabaseModule, FrameworkModule, OpenAIModule, TranscriptionModule],
    controllers: [PracticeController],
    providers: [
        PracticeService,
        StructureHintService,
        { provide: PracticeStore, useClass: MysqlPracticeStore },
        { provide: SectionAnswerStore, useClass: MysqlSectionAnswerStore },
    ],
    exports: [PracticeService, SectionAnswerStore],
})
export class PracticeModule {}
