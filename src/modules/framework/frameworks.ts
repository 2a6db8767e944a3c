import { Framework, FrameworkRegistration } from './framework.types';

export const STAR: Framework = {
    name: 'STAR',
    displayName: 'STAR',
    sections: ['Situation', 'Task', 'Action', 'Result'],
    sectionHints: {
        Situation:
            'Describe the context. What was happening? Where were you? What was the challenge or scenario?',
        Task: 'Define your responsibility. What was your specific role? What were you asked to do?',
        Action: 'Explain your actions. What specific steps did you take? How did you approach the problem?',
        Result: 'Share the outcome. What happened? What were the measurable results? What did you learn?',
    },
};

export const CTETD: Framework = {
    name: 'C-T-E-T-D',
    displayName: 'C-T-E-T-D',
    sections: ['Context', 'Theory', 'Example', 'Trade-offs', 'Decision'],
    sectionHints: {
        Context:
            'Set the stage. Explain the background, scenario, or environment where this concept applies.',
        Theory: 'Define the core concept. Explain how it works, key principles, or the underlying mechanism.',
        Example:
            'Provide a concrete example. Show working code, a real scenario, or a practical demonstration.',
        'Trade-offs':
            'Discuss pros and cons. What are the benefits? What are the limitations or downsides?',
        Decision:
            "Conclude with your recommendation. When would you use this? What's your best practice?",
    },
};

export const GCDIO: Framework = {
    name: 'GCDIO',
    displayName: 'G-C-D-I-O',
    sections: ['Goal', 'Constraints', 'Decision', 'Implementation', 'Outcome'],
    sectionHints: {
        Goal: 'State the objective. What were you trying to achieve? What problem needed solving?',
        Constraints:
            'Identify limitations. What constraints did you face? (time, resources, requirements, etc.)',
        Decision:
            'Explain your choice. What approach did you decide on? Why did you choose it over alternatives?',
        Implementation:
            'Describe execution. How did you implement your decision? What specific steps or code?',
        Outcome:
            'Share results. What was the impact? Did you meet the goal? What were the trade-offs?',
    },
};

// "start" 같은 단어에 걸리지 않도록 단어 경계로 검사
const STAR_WORD = /\bstar\b/;

export const DEFAULT_REGISTRATIONS: readonly FrameworkRegistration[] = [
    {
        framework: STAR,
        priority: 10,
        matcher: (hint) => STAR_WORD.test(hint) || hint.includes('situation'),
    },
    {
        framework: GCDIO,
        priority: 20,
        matcher: (hint) =>
            hint.includes('gcdio') ||
            hint.includes('g-c-d-i-o') ||
            (hint.includes('goal') && hint.includes('constraints')),
    },
    {
        framework: CTETD,
        priority: 30,
        matcher: (hint) =>
            hint.includes('c-t-e-t-d') ||
            hint.includes('ctetd') ||
            (hint.includes('theory') && hint.includes('trade-off')),
    },
];

export const DEFAULT_FRAMEWORK = STAR;
