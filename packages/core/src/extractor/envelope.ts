/**
 * Header/body split for SMS and e-mail import files.
 *
 * Files may start with `Header: value` lines (From, Subject, Date) followed by
 * a blank line. A file without such a block (first line not a header, or no
 * blank line after the headers) is all body.
 */

export interface MessageEnvelope {
    /** Header names lowercased; the last occurrence wins. */
    headers: Record<string, string>;
    body: string;
}

const HEADER_LINE = /^([A-Za-z][A-Za-z0-9-]*):[ \t]*(.*)$/;

export function parseMessageEnvelope(raw: string): MessageEnvelope {
    const lines = raw.replace(/\r\n/g, '\n').split('\n');
    const headers: Record<string, string> = {};

    if (lines.length === 0 || !HEADER_LINE.test(lines[0])) {
        return { headers, body: raw.trim() };
    }

    let i = 0;
    let lastKey: string | null = null;
    for (; i < lines.length; i++) {
        const line = lines[i];
        if (line.trim() === '') break;

        // Folded continuation line
        if (/^[ \t]/.test(line) && lastKey) {
            headers[lastKey] = `${headers[lastKey]} ${line.trim()}`;
            continue;
        }

        const match = HEADER_LINE.exec(line);
        if (!match) {
            // Not a header block after all
            return { headers: {}, body: raw.trim() };
        }
        lastKey = match[1].toLowerCase();
        headers[lastKey] = match[2].trim();
    }

    if (i === lines.length) {
        return { headers: {}, body: raw.trim() };
    }

    return { headers, body: lines.slice(i + 1).join('\n').trim() };
}
