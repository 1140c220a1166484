import type { Credentials } from '../types.js';
import { TERMS_FIELD_PATTERN, hiddenFields, inputType, termsFields } from './forms.js';

/**
 * Site-specific knowledge about login and terms-acceptance forms.
 *
 * The authenticator drives the protocol; an adapter decides which form to
 * use and what to put in it. New sites are supported by adding an adapter,
 * without touching the crawl core.
 */
export interface FormAdapter {
  readonly name: string;
  /** URL fragments that indicate a logged-in landing page. */
  readonly postLoginFragments: readonly string[];
  selectLoginForm(document: Document): HTMLFormElement | null;
  buildLoginFields(form: HTMLFormElement, credentials: Credentials): URLSearchParams;
  selectTermsForm(document: Document): HTMLFormElement | null;
  buildTermsFields(form: HTMLFormElement): URLSearchParams;
}

/** Names of the built-in adapters. */
export type FormAdapterName = 'generic' | 'wordpress';

export const FORM_ADAPTER_NAMES: readonly FormAdapterName[] = ['generic', 'wordpress'];

/**
 * Adapter for ordinary username/password forms.
 *
 * Field names are taken from the form itself when it has recognizable
 * inputs, otherwise `username` / `password` are used.
 */
export class GenericFormAdapter implements FormAdapter {
  readonly name: string = 'generic';
  readonly postLoginFragments: readonly string[] = ['account', 'dashboard', 'profile', 'logout'];
  protected readonly defaultUsernameField: string = 'username';
  protected readonly defaultPasswordField: string = 'password';

  selectLoginForm(document: Document): HTMLFormElement | null {
    const withPassword = Array.from(document.querySelectorAll('form')).find(
      (form) => Array.from(form.querySelectorAll('input')).some((input) => inputType(input) === 'password'),
    );
    return withPassword ?? document.querySelector('form');
  }

  buildLoginFields(form: HTMLFormElement, credentials: Credentials): URLSearchParams {
    const fields = hiddenFields(form);
    fields.set(this.usernameField(form), credentials.username);
    fields.set(this.passwordField(form), credentials.password);
    return fields;
  }

  selectTermsForm(document: Document): HTMLFormElement | null {
    const forms = Array.from(document.querySelectorAll('form'));
    const withTermsBox = forms.find((form) =>
      Array.from(form.querySelectorAll('input')).some(
        (input) =>
          inputType(input) === 'checkbox' &&
          TERMS_FIELD_PATTERN.test(input.getAttribute('name') ?? ''),
      ),
    );
    return withTermsBox ?? forms[0] ?? null;
  }

  buildTermsFields(form: HTMLFormElement): URLSearchParams {
    return termsFields(form);
  }

  /**
   * The name of the form's username input: a text or email input whose
   * name looks like a login field, else the first text or email input.
   */
  protected usernameField(form: HTMLFormElement): string {
    const candidates = Array.from(form.querySelectorAll('input')).filter((input) => {
      const type = inputType(input);
      return (type === 'text' || type === 'email') && input.getAttribute('name');
    });
    const preferred = candidates.find((input) =>
      /user|login|email|^log$/i.test(input.getAttribute('name') ?? ''),
    );
    return (preferred ?? candidates[0])?.getAttribute('name') ?? this.defaultUsernameField;
  }

  protected passwordField(form: HTMLFormElement): string {
    const input = Array.from(form.querySelectorAll('input')).find(
      (candidate) => inputType(candidate) === 'password' && candidate.getAttribute('name'),
    );
    return input?.getAttribute('name') ?? this.defaultPasswordField;
  }
}

/**
 * Adapter for WordPress `wp-login.php` forms (`log` / `pwd`, plus the
 * `wp-submit` and `testcookie` fields the login handler expects).
 */
export class WordPressFormAdapter extends GenericFormAdapter {
  override readonly name: string = 'wordpress';
  override readonly postLoginFragments: readonly string[] = ['wp-admin', 'file-access', 'downloads'];
  protected override readonly defaultUsernameField: string = 'log';
  protected override readonly defaultPasswordField: string = 'pwd';

  override selectLoginForm(document: Document): HTMLFormElement | null {
    return document.querySelector<HTMLFormElement>('form#loginform') ?? super.selectLoginForm(document);
  }

  override buildLoginFields(form: HTMLFormElement, credentials: Credentials): URLSearchParams {
    const fields = super.buildLoginFields(form, credentials);
    if (!fields.has('wp-submit')) {
      fields.set('wp-submit', 'Log In');
    }
    if (!fields.has('testcookie')) {
      fields.set('testcookie', '1');
    }
    return fields;
  }
}

/**
 * Resolve a FormAdapter instance based on the adapter name.
 *
 * @param adapter - A built-in adapter name, or an adapter instance to use as-is
 * @returns A FormAdapter instance
 */
export function getFormAdapter(adapter: FormAdapterName | FormAdapter): FormAdapter {
  if (typeof adapter !== 'string') {
    return adapter;
  }
  switch (adapter) {
    case 'generic':
      return new GenericFormAdapter();
    case 'wordpress':
      return new WordPressFormAdapter();
    default: {
      const _exhaustive: never = adapter;
      throw new Error(`Unknown form adapter: ${String(_exhaustive)}`);
    }
  }
}
