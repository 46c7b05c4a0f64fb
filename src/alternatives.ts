/**
 * update-alternatives registration for generated images.
 *
 * All aliases of one image share a single registration group: the first
 * alias is the master link, every later alias is a --slave link of it.
 *
 * Ordered-override rule: adding an alias that is already registered
 * replaces its target path in place. The last write for a generic name
 * wins, so callers register clang before gcc.
 */

import { ALTERNATIVES_PRIORITY } from "./constants.js";

export interface Alternative {
  /** Generic command name, linked as /usr/bin/<alias>. */
  alias: string;
  /** Versioned binary the alias resolves to. */
  path: string;
}

export class AlternativesList {
  private readonly entries: Alternative[] = [];

  add(alias: string, path: string): this {
    const existing = this.entries.find((e) => e.alias === alias);
    if (existing) {
      existing.path = path;
    } else {
      this.entries.push({ alias, path });
    }
    return this;
  }

  addAll(pairs: ReadonlyArray<readonly [string, string]>): this {
    for (const [alias, path] of pairs) {
      this.add(alias, path);
    }
    return this;
  }

  get size(): number {
    return this.entries.length;
  }

  toArray(): Alternative[] {
    return this.entries.map((e) => ({ ...e }));
  }

  /**
   * Render as one update-alternatives command, continuation lines indented
   * by `indent`. Empty string when nothing is registered.
   */
  render(indent = "        "): string {
    const [primary, ...secondary] = this.entries;
    if (!primary) {
      return "";
    }

    const link = ({ alias, path }: Alternative) => `/usr/bin/${alias} ${alias} ${path}`;
    const lines = [`update-alternatives --install ${link(primary)} ${ALTERNATIVES_PRIORITY}`];
    for (const entry of secondary) {
      lines.push(`${indent}--slave ${link(entry)}`);
    }
    return lines.join(" \\\n");
  }
}
