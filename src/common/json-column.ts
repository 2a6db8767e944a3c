import { z } from 'zod';

// JSON 컬럼은 드라이버 설정에 따라 문자열 또는 객체로 온다
export const jsonColumn = <S extends z.ZodTypeAny>(schema: S) =>
    z.preprocess((v) => (typeof v === 'string' ? parseJson(v) : v), schema);

function parseJson(text: string): unknown {
    try {
        const value: unknown = JSON.parse(text);
        return value;
    } catch {
        // 파싱 불가 문자열은 그대로 두고 스키마 검증에서 걸러낸다
        return text;
    }
}
