import type { Element } from 'domhandler';

import { ElementError } from '../errors/app-error.js';

import type { PageDocument } from './document.js';
import { findOwnerForm, selectedValues } from './forms.js';

export interface NodeDriver {
  click(node: PageNode): Promise<void>;
  submit(node: PageNode): Promise<void>;
}

const TEXT_LIKE_EXCLUDED = new Set([
  'checkbox',
  'radio',
  'submit',
  'image',
  'button',
  'reset',
  'file',
]);

/**
 * Handle on an element of the page it was found on.
 */
export class PageNode {
  constructor(
    private readonly driver: NodeDriver,
    readonly page: PageDocument,
    readonly element: Element
  ) {}

  get tagName(): string {
    return this.element.tagName.toLowerCase();
  }

  get type(): string {
    const fallback = this.tagName === 'input' ? 'text' : '';
    return (this.element.attribs.type ?? fallback).toLowerCase();
  }

  get value(): string | undefined {
    if (this.tagName === 'textarea') return this.page.$(this.element).text();
    if (this.tagName === 'select') {
      return selectedValues(this.page.$, this.element)[0];
    }
    return this.element.attribs.value;
  }

  get checked(): boolean {
    return this.element.attribs.checked !== undefined;
  }

  text(): string {
    return this.page.$(this.element).text().trim();
  }

  attr(name: string): string | undefined {
    return this.element.attribs[name];
  }

  find(selector: string): PageNode[] {
    return this.page
      .find(selector, this.element)
      .map((element) => new PageNode(this.driver, this.page, element));
  }

  set(value: string): void {
    const $ = this.page.$;
    if (this.tagName === 'textarea') {
      $(this.element).text(value);
      return;
    }
    if (this.tagName === 'input' && !TEXT_LIKE_EXCLUDED.has(this.type)) {
      $(this.element).attr('value', value);
      return;
    }
    if (this.tagName === 'select') {
      this.selectOption(value);
      return;
    }
    throw new ElementError(
      `Cannot set a value on a <${this.tagName}> element`,
      this.tagName
    );
  }

  setChecked(checked: boolean): void {
    const checkable = this.type === 'checkbox' || this.type === 'radio';
    if (this.tagName !== 'input' || !checkable) {
      throw new ElementError(
        `Cannot check a <${this.tagName}> element`,
        this.tagName
      );
    }
    const $ = this.page.$;
    if (checked && this.type === 'radio') {
      for (const radio of this.radioGroup()) $(radio).removeAttr('checked');
    }
    if (checked) {
      $(this.element).attr('checked', 'checked');
    } else {
      $(this.element).removeAttr('checked');
    }
  }

  click(): Promise<void> {
    return this.driver.click(this);
  }

  submit(): Promise<void> {
    return this.driver.submit(this);
  }

  private radioGroup(): Element[] {
    const $ = this.page.$;
    const name = this.element.attribs.name;
    if (!name) return [];
    const form = findOwnerForm($, this.element);
    return $('input[type="radio"]')
      .toArray()
      .filter(
        (radio) =>
          radio.attribs.name === name && findOwnerForm($, radio) === form
      );
  }

  private selectOption(value: string): void {
    const $ = this.page.$;
    const options = $(this.element).find('option').toArray();
    const match = options.find(
      (option) =>
        (option.attribs.value ?? $(option).text().trim()) === value ||
        $(option).text().trim() === value
    );
    if (!match) {
      throw new ElementError(`No option matching "${value}"`, this.tagName);
    }
    if (this.element.attribs.multiple === undefined) {
      for (const option of options) $(option).removeAttr('selected');
    }
    $(match).attr('selected', 'selected');
  }
}
