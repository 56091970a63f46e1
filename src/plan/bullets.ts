const CHECKBOX_RE = /^-\s*\[([ xX])\]\s*(.*)$/;
const BARE_BULLET_RE = /^-\s*(.*)$/;
const HORIZONTAL_RULE_RE = /^-{3,}$/;

export interface Bullet {
    text: string;
    checked: boolean;
}

/**
 * Match a `- [ ] text`, `- [x] text` or `- text` line (already trimmed).
 * Returns null for non-bullets and for bullets with no text.
 */
export function matchBullet(line: string): Bullet | null {
    if (HORIZONTAL_RULE_RE.test(line)) return null;
    const checkbox = CHECKBOX_RE.exec(line);
    if (checkbox) {
        const text = checkbox[2].trim();
        return text ? { text, checked: checkbox[1] !== ' ' } : null;
    }
    const bare = BARE_BULLET_RE.exec(line);
    if (bare) {
        const text = bare[1].trim();
        return text ? { text, checked: false } : null;
    }
    return null;
}
