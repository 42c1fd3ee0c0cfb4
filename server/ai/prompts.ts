export const QUESTION_SCHEMA = {
  question: "string (use LaTeX if needed)",
  options: ["string", "string", "string", "string", "string"],
  correct_index: "integer (0-4)",
  explanation: "string (step-by-step; LaTeX allowed)",
};

export function buildQuestionPrompt(topic: string, difficulty: string): string {
  return `Generate ONE multiple-choice math question as JSON ONLY (no extra text).
Topic: ${topic}
Difficulty: ${difficulty}
Requirements:
- Use LaTeX for math (e.g., $x^2$, \\frac{a}{b}).
- Provide EXACTLY 5 unique options in an array.
- Set correct_index to the correct option's index (0-4).
- Keys must be: question, options, correct_index, explanation.

Return a compact JSON matching this schema: ${JSON.stringify(QUESTION_SCHEMA)}
`;
}
