import { ParseError } from '../errors';

/**
 * Pull a JSON object out of model output that may be wrapped in markdown
 * fences or surrounded by prose. Throws ParseError when nothing parses.
 */
export function extractJsonObject(text: string): unknown {
    const cleaned = text
        .replace(/^\s*```(?:json)?\s*\n?/i, '')
        .replace(/\n?```\s*$/i, '')
        .trim();

    if (cleaned === '') {
        throw new ParseError('Model returned an empty response', text);
    }

    const direct = tryParse(cleaned);
    if (direct !== undefined) {
        return direct;
    }

    const start = cleaned.indexOf('{');
    const end = cleaned.lastIndexOf('}');
    if (start >= 0 && end > start) {
        const slice = cleaned.slice(start, end + 1);
        const extracted = tryParse(slice) ?? tryParse(slice.replace(/,\s*([\]}])/g, '$1'));
        if (extracted !== undefined) {
            return extracted;
        }
    }

    throw new ParseError('Model response does not contain a JSON object', text);
}

function tryParse(candidate: string): unknown {
    try {
        return JSON.parse(candidate);
    } catch {
        return undefined;
    }
}
