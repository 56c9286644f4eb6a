/**
 * Greedy word wrap. Paragraph breaks are kept; words longer than `width`
 * stay on a line of their own.
 */
export function wrapText(text: string, width = 80): string {
    return text
        .split(/\r?\n/)
        .map((paragraph) => wrapParagraph(paragraph, width))
        .join("\n");
}

function wrapParagraph(paragraph: string, width: number): string {
    const words = paragraph.split(/\s+/).filter(Boolean);
    const lines: string[] = [];
    let current = "";

    for (const word of words) {
        if (!current) {
            current = word;
        } else if (current.length + 1 + word.length <= width) {
            current += ` ${word}`;
        } else {
            lines.push(current);
            current = word;
        }
    }

    if (current) {
        lines.push(current);
    }
    return lines.join("\n");
}
