import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';

import { ValidationError } from '../errors/app-error.js';

import { getErrorMessage } from '../utils/error-utils.js';

/**
 * Parsed body of the current page. Element mutations (typed values,
 * checked boxes) live here until the next navigation.
 */
export class PageDocument {
  readonly $: CheerioAPI;

  constructor(
    html: string,
    readonly url: string
  ) {
    this.$ = cheerio.load(html);
  }

  find(selector: string, scope?: Element): Element[] {
    try {
      const found = scope ? this.$(scope).find(selector) : this.$<Element, string>(selector);
      return found.toArray();
    } catch (error) {
      throw new ValidationError(`Invalid selector: ${selector}`, {
        selector,
        reason: getErrorMessage(error),
      });
    }
  }

  title(): string {
    return this.$('title').first().text().trim();
  }
}
