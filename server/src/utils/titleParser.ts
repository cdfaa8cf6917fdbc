export interface ParsedTitle {
    author: string;
    title: string;
}

// "Author - Title", with hyphen, en dash or em dash separators
const DASH_PATTERN = /^(.*?)\s*[-–—]+\s*(.*)$/;
// "Title by Author"
const BY_PATTERN = /^(.*?)\s+by\s+(.*)$/i;

/**
 * Split a folder or file name (without extension) into author and title.
 * The first matching pattern wins; an unmatched name becomes the title.
 */
export function parseAuthorTitle(name: string): ParsedTitle {
    const trimmed = name.trim();

    const dashMatch = DASH_PATTERN.exec(trimmed);
    if (dashMatch) {
        return { author: dashMatch[1].trim(), title: dashMatch[2].trim() };
    }

    const byMatch = BY_PATTERN.exec(trimmed);
    if (byMatch) {
        return { author: byMatch[2].trim(), title: byMatch[1].trim() };
    }

    return { author: '', title: trimmed };
}

export function buildSearchQuery({ author, title }: ParsedTitle): string {
    return `${title} ${author}`.trim();
}
