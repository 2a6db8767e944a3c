export const PracticeQueries = {
    /**
     * 연습 세션 생성
     *
     * 파라미터 순서:
     * 1. interviewId (string)
     * 2. track (string)
     * 3. difficulty (string | null)
     * 4. questions (JSON string)
     */
    insertPractice: `
        INSERT INTO structure_practices (interview_id, track, difficulty, status, questions)
        VALUES (?, ?, ?, 'in_progress', CAST(? AS JSON))
    `,

    /**
     * 연습 세션 단건 조회
     *
     * 파라미터 순서:
     * 1. practiceId (number)
     */
    getPractice: `
        SELECT practice_id, interview_id, track, difficulty, status, questions, created_at
        FROM structure_practices
        WHERE practice_id = ?
    `,

    /**
     * 면접 ID로 연습 세션 목록 조회 (생성 순)
     *
     * 파라미터 순서:
     * 1. interviewId (string)
     */
    listPracticesByInterview: `
        SELECT practice_id, interview_id, track, difficulty, status, questions, created_at
        FROM structure_practices
        WHERE interview_id = ?
        ORDER BY created_at ASC, practice_id ASC
    `,

    /**
     * 연습 세션 상태 변경
     *
     * 파라미터 순서:
     * 1. status (string)
     * 2. practiceId (number)
     */
    updatePracticeStatus: `
        UPDATE structure_practices SET status = ? WHERE practice_id = ?
    `,
};

export const SectionAnswerQueries = {
    /**
     * 섹션 답변 upsert (같은 연습/질문/섹션이면 덮어쓰기)
     *
     * 파라미터 순서:
     * 1. practiceId (number)
     * 2. questionIndex (number)
     * 3. sectionName (string)
     * 4. answerText (string)
     * 5. timeSpentSeconds (number | null)
     * 6. transcription (JSON string | null)
     */
    upsertAnswer: `
        INSERT INTO structure_practice_answers
            (practice_id, question_index, section_name, answer_text, time_spent_seconds, transcription, submitted_at)
        VALUES (?, ?, ?, ?, ?, CAST(? AS JSON), CURRENT_TIMESTAMP(3))
        ON DUPLICATE KEY UPDATE
            answer_id = LAST_INSERT_ID(answer_id),
            answer_text = VALUES(answer_text),
            time_spent_seconds = VALUES(time_spent_seconds),
            transcription = VALUES(transcription),
            submitted_at = CURRENT_TIMESTAMP(3)
    `,

    /**
     * 답변 단건 조회
     *
     * 파라미터 순서:
     * 1. answerId (number)
     */
    getAnswer: `
        SELECT answer_id, practice_id, question_index, section_name, answer_text,
               time_spent_seconds, transcription, submitted_at
        FROM structure_practice_answers
        WHERE answer_id = ?
    `,

    /**
     * 질문 하나의 섹션 답변 목록
     *
     * 파라미터 순서:
     * 1. practiceId (number)
     * 2. questionIndex (number)
     */
    listForQuestion: `
        SELECT answer_id, practice_id, question_index, section_name, answer_text,
               time_spent_seconds, transcription, submitted_at
        FROM structure_practice_answers
        WHERE practice_id = ? AND question_index = ?
        ORDER BY submitted_at ASC, answer_id ASC
    `,

    /**
     * 연습 세션 전체 섹션 답변 목록
     *
     * 파라미터 순서:
     * 1. practiceId (number)
     */
    listForPractice: `
        SELECT answer_id, practice_id, question_index, section_name, answer_text,
               time_spent_seconds, transcription, submitted_at
        FROM structure_practice_answers
        WHERE practice_id = ?
        ORDER BY question_index ASC, submitted_at ASC, answer_id ASC
    `,

    /**
     * 분석 결과 저장: 지정한 답변에만 남기고 같은 질문의 나머지는 비움 (단일 UPDATE)
     *
     * 파라미터 순서:
     * 1. answerId (number)
     * 2. analysis (JSON string)
     * 3. answerId (number)
     * 4. practiceId (number)
     * 5. questionIndex (number)
     */
    saveAnalysis: `
        UPDATE structure_practice_answers
        SET analysis_result = CASE WHEN answer_id = ? THEN CAST(? AS JSON) ELSE NULL END,
            analyzed_at = CASE WHEN answer_id = ? THEN CURRENT_TIMESTAMP(3) ELSE NULL END
        WHERE practice_id = ? AND question_index = ?
    `,

    /**
     * 질문의 최신 분석 결과
     *
     * 파라미터 순서:
     * 1. practiceId (number)
     * 2. questionIndex (number)
     */
    findLatestAnalysis: `
        SELECT answer_id, analysis_result, analyzed_at
        FROM structure_practice_answers
        WHERE practice_id = ? AND question_index = ? AND analysis_result IS NOT NULL
        ORDER BY analyzed_at DESC, answer_id DESC
        LIMIT 1
    `,
};
