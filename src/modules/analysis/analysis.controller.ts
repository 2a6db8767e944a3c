import {
    BadRequestException,
    Body,
    Controller,
    Get,
    HttpCode,
    Param,
    ParseIntPipe,
    Post,
} from '@nestjs/common';
import { z } from 'zod';
import { AnalysisService, AnalyzeQuestionResult, LatestAnalysisView } from './analysis.service';

// 종류 검증(미지원/빈 목록)은 서비스에서 도메인 오류로 처리
const AnalyzeBodySchema = z
    .object({
        analysisKinds: z.array(z.string()).optional(),
        timeoutMs: z.number().int().min(100).max(120_000).optional(),
    })
    .optional();

@Controller('practices')
export class AnalysisController {
    constructor(private readonly analysis: AnalysisService) {}

    // POST /api/practices/:practiceId/questions/:questionIndex/analyze
    @Post(':practiceId/questions/:questionIndex/analyze')
    @HttpCode(200)
    async analyze(
        @Param('practiceId', ParseIntPipe) practiceId: number,
        @Param('questionIndex', ParseIntPipe) questionIndex: number,
        @Body() body: unknown,
    ): Promise<AnalyzeQuestionResult> {
        const parsed = AnalyzeBodySchema.safeParse(body);
        if (!parsed.success) {
            throw new BadRequestException(parsed.error.flatten());
        }
        return this.analysis.analyzeQuestion(practiceId, questionIndex, {
            kinds: parsed.data?.analysisKinds,
            timeoutMs: parsed.data?.timeoutMs,
        });
    }

    // GET /api/practices/:practiceId/questions/:questionIndex/analysis
    @Get(':practiceId/questions/:questionIndex/analysis')
    async latest(
        @Param('practiceId', ParseIntPipe) practiceId: number,
        @Param('questionIndex', ParseIntPipe) questionIndex: number,
    ): Promise<LatestAnalysisView> {
        return this.analysis.getLatestAnalysis(practiceId, questionIndex);
    }
}
