const WRAPPING_PAIRS: Array<[string, string]> = [
    ["\"", "\""],
    ["'", "'"],
    ["“", "”"],
    ["‘", "’"],
];

const HEADING_SCAN_LINES = 5;

export function stripWrappingQuotes(value?: string): string {
    let result = (value ?? "").trim();
    for(const [start, end] of WRAPPING_PAIRS) {
        if(result.length >= start.length + end.length && result.startsWith(start) && result.endsWith(end)) {
            result = result.slice(start.length, result.length - end.length).trim();
        }
    }
    return result;
}

function isUpperCaseLine(line: string): boolean {
    return /\p{L}/u.test(line) && line === line.toUpperCase();
}

function isHeadingLine(line: string): boolean {
    return line.startsWith("#") || line.endsWith(":") || isUpperCaseLine(line);
}

/**
 * Finds a section heading among the first non-empty lines of a page:
 * a markdown heading, a line ending in a colon, or an all upper-case line.
 */
export function extractSectionTitle(pageText: string): string | undefined {
    const lines = pageText
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0)
        .slice(0, HEADING_SCAN_LINES);

    for(const line of lines) {
        if(!isHeadingLine(line)) {
            continue;
        }
        const title = stripWrappingQuotes(line.replace(/^#+\s*/, "").replace(/:$/, ""));
        if(title) {
            return title;
        }
    }

    return undefined;
}
