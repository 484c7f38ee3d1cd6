/** Priority token used when a line carries no `(X)` group */
export const NO_PRIORITY = 'N';

/** Uppercase letters, or `N` for none */
export type Priority = string;
