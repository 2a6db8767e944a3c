import {
    BadRequestException,
    Body,
    Controller,
    Get,
    Logger,
    Param,
    ParseIntPipe,
    Post,
    UploadedFile,
    UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { z } from 'zod';
import { PracticeService } from './practice.service';
import {
    MAX_ANSWER_CHARS,
    PracticeView,
    ProgressSnapshot,
    SubmitSectionResult,
} from './types/practice.types';

// ===== 요청 바디 스키마 =====
const CreatePracticeBodySchema = z.object({
    interviewId: z.string().min(1).max(64).optional(),
    track: z.string().min(1),
    difficulty: z.string().min(1).optional(),
    questions: z
        .array(
            z.object({
                text: z.string().trim().min(1),
                category: z.string().min(1).optional(),
                structureHint: z.string().optional(),
            }),
        )
        .min(1),
});

const SubmitSectionBodySchema = z.object({
    sectionName: z.string().min(1),
    answerText: z.string().trim().min(1).max(MAX_ANSWER_CHARS),
    timeSpentSeconds: z.number().int().min(0).optional(),
});

// multipart 필드는 모두 문자열로 들어온다
const SubmitAudioBodySchema = z.object({
    sectionName: z.string().min(1),
    timeSpentSeconds: z.coerce.number().int().min(0).optional(),
    language: z.string().min(2).max(8).optional(),
});

@Controller('practices')
export class PracticeController {
    private readonly logger = new Logger(PracticeController.name);

    constructor(private readonly practices: PracticeService) {}

    // POST /api/practices
    @Post()
    async create(@Body() body: unknown): Promise<PracticeView> {
        const parsed = CreatePracticeBodySchema.safeParse(body);
        if (!parsed.success) {
            this.logger.warn(`createPractice 스키마 오류: ${JSON.stringify(parsed.error.flatten())}`);
            throw new BadRequestException(parsed.error.flatten());
        }
        return this.practices.createPractice(parsed.data);
    }

    // GET /api/practices/:practiceId
    @Get(':practiceId')
    async get(@Param('practiceId', ParseIntPipe) practiceId: number): Promise<PracticeView> {
        return this.practices.getPractice(practiceId);
    }

    // POST /api/practices/:practiceId/questions/:questionIndex/sections
    @Post(':practiceId/questions/:questionIndex/sections')
    async submitSection(
        @Param('practiceId', ParseIntPipe) practiceId: number,
        @Param('questionIndex', ParseIntPipe) questionIndex: number,
        @Body() body: unknown,
    ): Promise<SubmitSectionResult> {
        const parsed = SubmitSectionBodySchema.safeParse(body);
        if (!parsed.success) {
            throw new BadRequestException(parsed.error.flatten());
        }
        const { sectionName, answerText, timeSpentSeconds } = parsed.data;
        return this.practices.submitSection(
            practiceId,
            questionIndex,
            sectionName,
            answerText,
            timeSpentSeconds ?? null,
        );
    }

    // POST /api/practices/:practiceId/questions/:questionIndex/sections/audio (multipart: audio)
    @Post(':practiceId/questions/:questionIndex/sections/audio')
    @UseInterceptors(FileInterceptor('audio'))
    async submitSectionAudio(
        @Param('practiceId', ParseIntPipe) practiceId: number,
        @Param('questionIndex', ParseIntPipe) questionIndex: number,
        @UploadedFile() file: Express.Multer.File | undefined,
        @Body() body: unknown,
    ): Promise<SubmitSectionResult> {
        if (!file) throw new BadRequestException('audio file is required');
        const parsed = SubmitAudioBodySchema.safeParse(body);
        if (!parsed.success) {
            throw new BadRequestException(parsed.error.flatten());
        }
        const { sectionName, timeSpentSeconds, language } = parsed.data;
        return this.practices.submitSectionAudio(
            practiceId,
            questionIndex,
            sectionName,
            { buffer: file.buffer, filename: file.originalname, mimetype: file.mimetype },
            { timeSpentSeconds, language },
        );
    }

    // GET /api/practices/:practiceId/questions/:questionIndex/progress
    @Get(':practiceId/questions/:questionIndex/progress')
    async progress(
        @Param('practiceId', ParseIntPipe) practiceId: number,
        @Param('questionIndex', ParseIntPipe) questionIndex: number,
    ): Promise<ProgressSnapshot> {
        return this.practices.getSnapshot(practiceId, questionIndex);
    }
}
