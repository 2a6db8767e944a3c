import { Module } from '@nestjs/common';
import { OpenAIModule } from '../openai/openai.module';
import { PracticeModule } from '../practice/practice.module';
import { AnalysisAggregator } from './analysis.aggregator';
import { AnalysisController } from './analysis.controller';
import { AnalysisService } from './analysis.service';
import { ANALYSIS_DIMENSIONS, AnalysisDimension } from './dimensions/analysis-dimension';
import { ContentQualityDimension } from './dimensions/content-quality.dimension';
import { PaceDimension } from './dimensions/pace.dimension';
import { PauseDimension } from './dimensions/pause.dimension';
import { StructureDimension } from './dimensions/structure.dimension';

@Module({
    imports: [OpenAIModule, PracticeModule],
    controllers: [AnalysisController],
    providers: [
        ContentQualityDimension,
        StructureDimension,
        PaceDimension,
        PauseDimension,
        {
            provide: ANALYSIS_DIMENSIONS,
            useFactory: (
                content: ContentQualityDimension,
                structure: StructureDimension,
                pace: PaceDimension,
                pause: PauseDimension,
            ): AnalysisDimension[] => [content, structure, pace, pause],
            inject: [ContentQualityDimension, StructureDimension, PaceDimension, PauseDimension],
        },
        AnalysisAggregator,
        AnalysisService,
    ],
    exports: [AnalysisService],
})
export class AnalysisModule {}
