import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';

import type {
  FormParams,
  HeaderMap,
  HttpMethod,
  RequestBody,
} from '../config/types.js';

import { ValidationError } from '../errors/app-error.js';

import { resolveUrl } from '../utils/url-validator.js';

import { mergeHeaders } from './transports/headers.js';

export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

const SUBMIT_INPUT_TYPES = new Set(['submit', 'image']);
const VALUELESS_INPUT_TYPES = new Set(['button', 'reset', 'file']);
const QUERY_METHODS = new Set<HttpMethod>(['GET', 'HEAD', 'DELETE', 'OPTIONS']);

export interface FormSubmission {
  method: HttpMethod;
  url: string;
  body?: string;
  headers: HeaderMap;
}

export interface EncodedRequest {
  url: string;
  body?: RequestBody | undefined;
  headers?: HeaderMap | undefined;
}

function inputType(element: Element): string {
  return (element.attribs.type ?? 'text').toLowerCase();
}

export function isSubmitControl(element: Element): boolean {
  const tagName = element.tagName.toLowerCase();
  if (tagName === 'input') return SUBMIT_INPUT_TYPES.has(inputType(element));
  if (tagName === 'button') {
    const type = (element.attribs.type ?? 'submit').toLowerCase();
    return type === 'submit';
  }
  return false;
}

export function findOwnerForm(
  $: CheerioAPI,
  element: Element
): Element | undefined {
  const formId = element.attribs.form;
  if (formId) {
    return $('form')
      .toArray()
      .find((form) => form.attribs.id === formId);
  }
  return $(element).closest('form').toArray()[0];
}

function optionValue($: CheerioAPI, option: Element): string {
  return option.attribs.value ?? $(option).text().trim();
}

export function selectedValues($: CheerioAPI, select: Element): string[] {
  const options = $(select).find('option').toArray();
  const selected = options.filter(
    (option) => option.attribs.selected !== undefined
  );

  if (select.attribs.multiple !== undefined) {
    return selected.map((option) => optionValue($, option));
  }

  const chosen = selected.at(-1) ?? options[0];
  return chosen ? [optionValue($, chosen)] : [];
}

function controlEntries(
  $: CheerioAPI,
  control: Element,
  submitter: Element | undefined
): [string, string][] {
  const name = control.attribs.name;
  if (!name || control.attribs.disabled !== undefined) return [];

  const tagName = control.tagName.toLowerCase();
  if (tagName === 'textarea') return [[name, $(control).text()]];
  if (tagName === 'select') {
    return selectedValues($, control).map((value) => [name, value]);
  }
  if (isSubmitControl(control)) {
    return control === submitter ? [[name, control.attribs.value ?? '']] : [];
  }
  if (tagName === 'button') return [];

  const type = inputType(control);
  if (type === 'checkbox' || type === 'radio') {
    return control.attribs.checked !== undefined
      ? [[name, control.attribs.value ?? 'on']]
      : [];
  }
  if (VALUELESS_INPUT_TYPES.has(type)) return [];
  return [[name, control.attribs.value ?? '']];
}

export function collectFormParams(
  $: CheerioAPI,
  form: Element,
  submitter?: Element
): URLSearchParams {
  const params = new URLSearchParams();
  for (const control of $('input, textarea, select, button').toArray()) {
    if (findOwnerForm($, control) !== form) continue;
    for (const [name, value] of controlEntries($, control, submitter)) {
      params.append(name, value);
    }
  }
  return params;
}

export function buildFormSubmission(
  $: CheerioAPI,
  form: Element,
  pageUrl: string,
  submitter?: Element
): FormSubmission {
  const params = collectFormParams($, form, submitter);
  const method = (
    submitter?.attribs.formmethod ??
    form.attribs.method ??
    'get'
  ).toLowerCase();
  const action = resolveUrl(
    submitter?.attribs.formaction ?? form.attribs.action ?? '',
    pageUrl
  );

  if (method === 'post') {
    return {
      method: 'POST',
      url: action,
      body: params.toString(),
      headers: { 'Content-Type': FORM_CONTENT_TYPE },
    };
  }

  const url = new URL(action);
  url.search = params.toString();
  url.hash = '';
  return { method: 'GET', url: url.href, headers: {} };
}

export function toSearchParams(params: FormParams): URLSearchParams {
  if (params instanceof URLSearchParams) return new URLSearchParams(params);

  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    const values = Array.isArray(value) ? value : [value];
    for (const entry of values) search.append(key, entry);
  }
  return search;
}

/**
 * Puts request params in the query for GET-like methods and in a
 * form-encoded body otherwise.
 */
export function encodeParams(
  method: HttpMethod,
  url: string,
  params: FormParams | undefined,
  body: RequestBody | undefined,
  headers: HeaderMap | undefined
): EncodedRequest {
  if (!params) return { url, body, headers };

  const search = toSearchParams(params);
  if (QUERY_METHODS.has(method)) {
    const target = new URL(url);
    for (const [key, value] of search) target.searchParams.append(key, value);
    return { url: target.href, body, headers };
  }

  if (body !== undefined) {
    throw new ValidationError('Request params and body cannot be combined', {
      method,
      url,
    });
  }

  return {
    url,
    body: search.toString(),
    headers: mergeHeaders({ 'Content-Type': FORM_CONTENT_TYPE }, headers),
  };
}
