import { jsonrepair } from 'jsonrepair';

type ParseAttempt = { ok: true; value: unknown } | { ok: false; error: unknown };

function tryParse(text: string): ParseAttempt {
    try {
        return { ok: true, value: JSON.parse(text) };
    } catch (error: unknown) {
        return { ok: false, error };
    }
}

/**
 * Pulls the JSON payload out of model output: the first fenced block, else the
 * span from the first opening bracket to the last closing one, else the text itself.
 */
export function extractJson(text: string): string {
    const trimmed = text.trim();

    const fenceMatch = trimmed.match(/```[a-zA-Z0-9]*\s*\n([\s\S]*?)\n?```/);
    if (fenceMatch && fenceMatch[1]) {
        return fenceMatch[1].trim();
    }

    const bracketMatch = trimmed.match(/(\{[\s\S]*\}|\[[\s\S]*\])/);
    if (bracketMatch) {
        return bracketMatch[1].trim();
    }

    return trimmed;
}

/**
 * Safely parses JSON string, attempting to repair it if standard parse fails.
 * Useful for handling LLM outputs which may contain markdown fences or minor syntax errors.
 */
export function safeParse(input: string | null | undefined): unknown {
    if (!input || !input.trim()) {
        throw new Error('JSON input is empty');
    }

    // 1. Try standard parse first (fastest)
    const direct = tryParse(input);
    if (direct.ok) return direct.value;

    // 2. Strip Markdown code fences or surrounding prose
    const cleaned = extractJson(input);
    const extracted = tryParse(cleaned);
    if (extracted.ok) return extracted.value;

    // 3. Use jsonrepair to fix common LLM errors (missing quotes, trailing commas, etc.)
    let repaired: string;
    try {
        repaired = jsonrepair(cleaned);
    } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Failed to parse JSON: ${message}`, { cause: error });
    }

    const result = tryParse(repaired);
    if (!result.ok) {
        throw new Error('Failed to parse JSON after repair', { cause: result.error });
    }
    return result.value;
}
