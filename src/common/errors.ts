// src/common/errors.ts
import {
    BadGatewayException,
    BadRequestException,
    InternalServerErrorException,
    NotFoundException,
    UnprocessableEntityException,
} from '@nestjs/common';

/** ===== 사용자에게 노출되는 오류 (HTTP 응답으로 매핑) ===== */

export class InvalidSectionError extends BadRequestException {
    constructor(
        readonly value: string,
        readonly framework: string,
        readonly allowed: readonly string[],
    ) {
        super({
            statusCode: 400,
            error: 'InvalidSectionError',
            message: `Section "${value}" is not part of the ${framework} framework. Valid sections: ${allowed.join(', ')}`,
            field: 'sectionName',
            value,
            allowed: [...allowed],
        });
    }
}

export class QuestionIndexOutOfRangeError extends BadRequestException {
    constructor(
        readonly value: number,
        readonly questionCount: number,
    ) {
        super({
            statusCode: 400,
            error: 'QuestionIndexOutOfRangeError',
            message: `Question index ${value} is out of range. Valid range: 0..${questionCount - 1}`,
            field: 'questionIndex',
            value,
            validRange: { min: 0, max: questionCount - 1 },
        });
    }
}

export class EmptyAnswerError extends BadRequestException {
    constructor(message = 'Answer text is empty', questionIndex?: number) {
        super({
            statusCode: 400,
            error: 'EmptyAnswerError',
            message,
            field: questionIndex === undefined ? 'answerText' : 'questionIndex',
            value: questionIndex ?? '',
        });
    }
}

export class NoAnalysisKindsError extends BadRequestException {
    constructor(allowed: readonly string[]) {
        super({
            statusCode: 400,
            error: 'NoAnalysisKindsError',
            message: `At least one analysis kind must be requested. Supported: ${allowed.join(', ')}`,
            field: 'analysisKinds',
            value: [],
            allowed: [...allowed],
        });
    }
}

export class UnsupportedAnalysisKindError extends BadRequestException {
    constructor(value: string, allowed: readonly string[]) {
        super({
            statusCode: 400,
            error: 'UnsupportedAnalysisKindError',
            message: `Unsupported analysis kind "${value}". Supported: ${allowed.join(', ')}`,
            field: 'analysisKinds',
            value,
            allowed: [...allowed],
        });
    }
}

export class PracticeNotFoundError extends NotFoundException {
    constructor(practiceId: number) {
        super({
            statusCode: 404,
            error: 'PracticeNotFoundError',
            message: `Practice ${practiceId} not found`,
            field: 'practiceId',
            value: practiceId,
        });
    }
}

export class InterviewNotFoundError extends NotFoundException {
    constructor(interviewId: string) {
        super({
            statusCode: 404,
            error: 'InterviewNotFoundError',
            message: `No practice sessions found for interview ${interviewId}`,
            field: 'interviewId',
            value: interviewId,
        });
    }
}

export class ReportNotFoundError extends NotFoundException {
    constructor(interviewId: string) {
        super({
            statusCode: 404,
            error: 'ReportNotFoundError',
            message: `No report has been synthesized for interview ${interviewId}`,
            field: 'interviewId',
            value: interviewId,
        });
    }
}

export class ReportSynthesisFailure extends UnprocessableEntityException {
    constructor(interviewId: string, reason: string) {
        super({
            statusCode: 422,
            error: 'ReportSynthesisFailure',
            message: `Cannot synthesize a report for interview ${interviewId}: ${reason}`,
            field: 'interviewId',
            value: interviewId,
        });
    }
}

export class TranscriptionError extends BadGatewayException {
    constructor(reason: string) {
        super({
            statusCode: 502,
            error: 'TranscriptionError',
            message: `Transcription failed: ${reason}`,
            field: 'audio',
        });
    }
}

export class StorageError extends InternalServerErrorException {
    constructor(reason: string) {
        super({
            statusCode: 500,
            error: 'StorageError',
            message: `Storage operation failed: ${reason}`,
        });
    }
}

/** ===== 내부 오류 (집계기 안에서 복구, 호출자에게 노출하지 않음) ===== */

export class AnalysisTimeoutError extends Error {
    constructor(
        readonly kind: string,
        readonly timeoutMs: number,
    ) {
        super(`Analysis "${kind}" timed out after ${timeoutMs}ms`);
        this.name = 'AnalysisTimeoutError';
    }
}

export class AnalysisFailureError extends Error {
    constructor(
        readonly kind: string,
        reason: string,
    ) {
        super(`Analysis "${kind}" failed: ${reason}`);
        this.name = 'AnalysisFailureError';
    }
}

// 호출자가 섹션 소속을 먼저 검증해야 함
export class UnknownSectionError extends Error {
    constructor(
        readonly framework: string,
        readonly section: string,
    ) {
        super(`Section "${section}" does not belong to framework ${framework}`);
        this.name = 'UnknownSectionError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
