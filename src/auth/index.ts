export { Authenticator, AuthError } from './authenticator.js';
export type { LoginResult, TermsResult, AuthenticatorOptions } from './authenticator.js';
export {
  GenericFormAdapter,
  WordPressFormAdapter,
  getFormAdapter,
  FORM_ADAPTER_NAMES,
} from './adapters.js';
export type { FormAdapter, FormAdapterName } from './adapters.js';
export {
  resolveFormAction,
  hiddenFields,
  termsFields,
  submitControls,
  pickSubmitControl,
  TERMS_FIELD_PATTERN,
} from './forms.js';
export type { SubmitControl } from './forms.js';
