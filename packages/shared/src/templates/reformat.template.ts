/**
 * Reformat Instruction
 *
 * Appended to the prompt when the first response failed schema validation.
 */

export const REFORMAT_INSTRUCTION = `Your previous answer could not be parsed. Reply with ONLY a JSON object, no prose and no code fences.
It must contain every key listed below. Each value is a number, a string of digits (cik only), or null.
Do not add keys. Do not use units or thousands separators inside numbers.`;
