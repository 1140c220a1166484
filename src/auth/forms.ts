import { resolveHref } from '../fetcher/link-extractor.js';

/** Checkbox names that signal a terms-of-use acceptance box. */
export const TERMS_FIELD_PATTERN = /terms|accept|tc/i;

/**
 * Resolve a form's submission URL: its `action` attribute against the page
 * URL, or the page URL itself when the action is missing or unusable.
 */
export function resolveFormAction(form: HTMLFormElement, pageUrl: string): string {
  const base = form.ownerDocument.baseURI || pageUrl;
  return resolveHref(form.getAttribute('action'), base) ?? pageUrl;
}

/**
 * Lower-cased `type` of an input element (`text` when absent).
 */
export function inputType(input: Element): string {
  return (input.getAttribute('type') ?? 'text').toLowerCase();
}

/**
 * Copy every named hidden input into a field list, values verbatim.
 * Anti-forgery tokens and nonces must reach the server unmodified.
 */
export function hiddenFields(form: HTMLFormElement): URLSearchParams {
  const fields = new URLSearchParams();
  for (const input of form.querySelectorAll('input')) {
    const name = input.getAttribute('name');
    if (name && inputType(input) === 'hidden') {
      fields.append(name, input.getAttribute('value') ?? '');
    }
  }
  return fields;
}

/**
 * A submit control of a form, with the label a user would see.
 */
export interface SubmitControl {
  name: string;
  value: string;
  label: string;
}

/**
 * List the named submit controls of a form (`input[type=submit|image]`
 * and `button` elements that submit).
 */
export function submitControls(form: HTMLFormElement): SubmitControl[] {
  const controls: SubmitControl[] = [];
  for (const element of form.querySelectorAll('input, button')) {
    const name = element.getAttribute('name');
    if (!name) {
      continue;
    }
    const type = element.tagName === 'BUTTON'
      ? (element.getAttribute('type') ?? 'submit').toLowerCase()
      : inputType(element);
    if (type !== 'submit' && type !== 'image') {
      continue;
    }
    const text = (element.textContent ?? '').replace(/\s+/g, ' ').trim();
    const value = element.getAttribute('value') ?? text;
    controls.push({ name, value, label: value || text });
  }
  return controls;
}

/**
 * Pick the submit control whose label or name suggests a download, then
 * one that suggests a plain submit, then the first named control.
 */
export function pickSubmitControl(controls: SubmitControl[]): SubmitControl | undefined {
  const matches = (control: SubmitControl, pattern: RegExp): boolean =>
    pattern.test(control.label) || pattern.test(control.name);

  return (
    controls.find((control) => matches(control, /download/i)) ??
    controls.find((control) => matches(control, /submit/i)) ??
    controls[0]
  );
}

/**
 * Build the field list for a terms-acceptance form.
 *
 * - Checkboxes whose name matches TERMS_FIELD_PATTERN are checked
 * - Other checkboxes and radios are sent only when pre-checked
 * - Text, hidden, select and textarea fields are sent when they have a non-empty default
 * - One submit control is preserved (see pickSubmitControl)
 */
export function termsFields(form: HTMLFormElement): URLSearchParams {
  const fields = new URLSearchParams();

  for (const element of form.querySelectorAll('input, select, textarea')) {
    const name = element.getAttribute('name');
    if (!name) {
      continue;
    }

    if (element.tagName === 'SELECT') {
      const option =
        element.querySelector('option[selected]') ?? element.querySelector('option');
      const value = option
        ? (option.getAttribute('value') ?? (option.textContent ?? '').trim())
        : '';
      if (value) {
        fields.append(name, value);
      }
      continue;
    }

    if (element.tagName === 'TEXTAREA') {
      const value = element.textContent ?? '';
      if (value) {
        fields.append(name, value);
      }
      continue;
    }

    const type = inputType(element);
    switch (type) {
      case 'checkbox':
        if (TERMS_FIELD_PATTERN.test(name)) {
          fields.append(name, element.getAttribute('value') ?? '1');
        } else if (element.hasAttribute('checked')) {
          fields.append(name, element.getAttribute('value') ?? 'on');
        }
        break;
      case 'radio':
        if (element.hasAttribute('checked')) {
          fields.append(name, element.getAttribute('value') ?? 'on');
        }
        break;
      case 'submit':
      case 'image':
      case 'button':
      case 'reset':
      case 'file':
        break;
      default: {
        const value = element.getAttribute('value') ?? '';
        if (value) {
          fields.append(name, value);
        }
      }
    }
  }

  const submit = pickSubmitControl(submitControls(form));
  if (submit) {
    fields.append(submit.name, submit.value);
  }

  return fields;
}
