import { FileMetadata } from "../content/metadata";
import type { Navigation, NavigationItem } from "../content/types";
import { STYLESHEET_KEY, type Templates } from "../render/templates";
import { OneShot } from "./once";

/** Internal name of the synthesized table of contents */
export const TOC_FILENAME = "_toc.xhtml";

export const TOC_TITLE = "Оглавление";

export type NavigationState = "pending" | "satisfied";

/**
 * Collects navigation entries in discovery order and decides whether a
 * table of contents has to be synthesized once the walk is over.
 */
export class NavigationBuilder {
  private entries: NavigationItem[] = [];
  private declared = new OneShot();
  private frozen = false;

  get state(): NavigationState {
    return this.declared.isSet ? "satisfied" : "pending";
  }

  get items(): Navigation {
    return this.entries;
  }

  add(item: NavigationItem): void {
    if (this.frozen) {
      throw new Error(`Navigation is frozen, cannot add ${item.filename}`);
    }
    this.entries.push(Object.freeze({ ...item }));
  }

  /**
   * Record that a document declared the nav role.
   * Returns false when an earlier document already did.
   */
  declareNav(): boolean {
    return this.declared.trySet();
  }

  freeze(): Navigation {
    this.frozen = true;
    Object.freeze(this.entries);
    return this.entries;
  }

  /**
   * Render the fallback table of contents, or null when a document already
   * provides one
   */
  renderFallback(
    templates: Templates,
    lang: string,
    stylesheet: string | null
  ): string | null {
    if (this.state === "satisfied") {
      return null;
    }

    const data = new FileMetadata({ lang, title: TOC_TITLE });
    // The table of contents sits next to the stylesheet at the root
    if (stylesheet) {
      data.set(STYLESHEET_KEY, stylesheet);
    }

    return templates.toc(data, this.entries);
  }
}
