export const ReportQueries = {
    /**
     * 리포트 upsert (interview_id 유니크 키 기준 덮어쓰기)
     *
     * 파라미터 순서:
     * 1. reportId (string)
     * 2. interviewId (string)
     * 3. overallScore (number)
     * 4. scoreSummary (JSON string)
     * 5. overallFeedback (JSON string)
     * 6. questions (JSON string)
     * 7. perQuestionFeedback (JSON string)
     */
    upsertReport: `
        INSERT INTO practice_reports
            (report_id, interview_id, overall_score, score_summary, overall_feedback, questions, per_question_feedback)
        VALUES (?, ?, ?, CAST(? AS JSON), CAST(? AS JSON), CAST(? AS JSON), CAST(? AS JSON))
        ON DUPLICATE KEY UPDATE
            report_id = VALUES(report_id),
            overall_score = VALUES(overall_score),
            score_summary = VALUES(score_summary),
            overall_feedback = VALUES(overall_feedback),
            questions = VALUES(questions),
            per_question_feedback = VALUES(per_question_feedback),
            updated_at = CURRENT_TIMESTAMP(3)
    `,

    /**
     * 면접 ID로 리포트 조회
     *
     * 파라미터 순서:
     * 1. interviewId (string)
     */
    getReportByInterview: `
        SELECT report_id, interview_id, score_summary, overall_feedback, questions,
               per_question_feedback, created_at, updated_at
        FROM practice_reports
        WHERE interview_id = ?
    `,
};
