import { existsSync, readdirSync } from "node:fs";
import { basename, extname, join } from "node:path";
import type { RandomSource } from "../proactive/policy.js";

/** Index of local .gif assets keyed by the tokens of their file names. */
export class GifLibrary {
  private readonly index = new Map<string, string[]>();

  constructor(
    private readonly folder: string,
    private readonly random: RandomSource = Math.random,
  ) {
    this.rebuild();
  }

  rebuild(): void {
    this.index.clear();
    if (!existsSync(this.folder)) return;

    for (const file of readdirSync(this.folder).sort()) {
      if (extname(file).toLowerCase() !== ".gif") continue;
      const path = join(this.folder, file);
      for (const tag of tagsFromName(basename(file, extname(file)))) {
        const paths = this.index.get(tag) ?? [];
        paths.push(path);
        this.index.set(tag, paths);
      }
    }
  }

  tags(): string[] {
    return [...this.index.keys()].sort();
  }

  pickGif(tag: string | null | undefined): string | null {
    if (!tag) return null;
    const candidates = this.index.get(tag.toLowerCase());
    if (!candidates || candidates.length === 0) return null;
    const i = Math.min(Math.floor(this.random() * candidates.length), candidates.length - 1);
    return candidates[i] ?? null;
  }
}

export function tagsFromName(name: string): string[] {
  return name
    .toLowerCase()
    .split(/[_\-\s]+/)
    .filter((token) => token.length > 0);
}
