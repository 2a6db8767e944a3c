import { Controller, Get, HttpCode, Param, Post } from '@nestjs/common';
import { ReportService } from './report.service';

@Controller('reports')
export class ReportController {
    constructor(private readonly svc: ReportService) {}

    // POST /api/reports/:interviewId/synthesize
    @Post(':interviewId/synthesize')
    @HttpCode(200)
    async synthesize(@Param('interviewId') interviewId: string) {
        const data = await this.svc.synthesize(interviewId);
        return { success: true, data };
    }

    // GET /api/reports/:interviewId
    @Get(':interviewId')
    async getReport(@Param('interviewId') interviewId: string) {
        const data = await this.svc.getReport(interviewId);
        return { success: true, data };
    }
}
