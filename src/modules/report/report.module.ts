import { Module } from '@nestjs/common';
import { DatabaseModule } from '../../database/database.module';
import { OpenAIModule } from '../openai/openai.module';
import { PracticeModule } from '../practice/practice.module';
import { ReportController } from './report.controller';
import { ReportService } from './report.service';
import { ReportScoringService } from './services/report-scoring.service';
import { ScoreCalculationService } from './services/score-calculation.service';
import { MysqlReportStore } from './stores/mysql-report.store';
import { ReportStore } from './stores/report.store';

@Module({
    imports: [DatabaseModule, OpenAIModule, PracticeModule],
    controllers: [ReportController],
    providers: [
        ReportService,
        ReportScoringService,
        ScoreCalculationService,
        { provide: ReportStore, useClass: MysqlReportStore },
    ],
    exports: [ReportService],
})
export class ReportModule {}
