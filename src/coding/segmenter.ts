import type { QABlock } from "../schema.js";

const QUESTION_MARKER = /^Q[:：]\s*/;
const ANSWER_MARKER = /^A[:：]\s*/;

/**
 * Split a transcript into question/answer blocks
 *
 * Lines are trimmed and blank lines skipped. `Q:` / `Q：` opens a question and
 * `A:` / `A：` adds an answer line. Unmarked lines continue the open answer, or the
 * open question (space-joined) when no answer line has been seen yet.
 *
 * A question only becomes a block once it has at least one answer line; a question
 * followed directly by another question is replaced, and a trailing question with no
 * answer is dropped. Answer lines seen before the first question are held and open
 * the first question's answer.
 *
 * @example
 * parseQABlocks("Q: How is work?\nA: Busy\nvery tiring");
 * // [{ question: "How is work?", answer: "Busy\nvery tiring" }]
 */
export const parseQABlocks = (text: string): QABlock[] => {
    const blocks: QABlock[] = [];
    let question: string | undefined;
    let answer: string[] = [];

    const flush = () => {
        if (question !== undefined && answer.length) {
            blocks.push({ question: question.trim(), answer: answer.join("\n").trim() });
            answer = [];
        }
    };

    for (const raw of text.split(/\r?\n/)) {
        const line = raw.trim();
        if (!line) {
            continue;
        }
        if (QUESTION_MARKER.test(line)) {
            flush();
            question = line.replace(QUESTION_MARKER, "");
        } else if (ANSWER_MARKER.test(line)) {
            const body = line.replace(ANSWER_MARKER, "");
            if (body) {
                answer.push(body);
            }
        } else if (answer.length) {
            answer.push(line);
        } else if (question !== undefined) {
            question += ` ${line}`;
        }
    }
    flush();

    return blocks;
};
