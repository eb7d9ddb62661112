// ── Filename Globs ──────────────────────────────────────────────────────────
//
// Basename-only matching: `*` any run of characters, `?` one character,
// `[abc]` a character class. Matching is case-sensitive.

const cache = new Map<string, RegExp>();

export function globToRegExp(glob: string): RegExp {
  const cached = cache.get(glob);
  if (cached) return cached;

  let source = "";
  for (let i = 0; i < glob.length; i++) {
    const ch = glob.charAt(i);
    if (ch === "*") {
      source += ".*";
    } else if (ch === "?") {
      source += ".";
    } else if (ch === "[") {
      const close = glob.indexOf("]", i + 1);
      if (close === -1) {
        source += "\\[";
      } else {
        const body = glob.slice(i + 1, close).replace(/\\/g, "\\\\");
        source += `[${body.startsWith("!") ? `^${body.slice(1)}` : body}]`;
        i = close;
      }
    } else {
      source += ch.replace(/[.+^${}()|\\\]]/g, "\\$&");
    }
  }

  const re = new RegExp(`^${source}$`);
  cache.set(glob, re);
  return re;
}

export function matchesGlob(fileName: string, glob: string): boolean {
  return globToRegExp(glob).test(fileName);
}
