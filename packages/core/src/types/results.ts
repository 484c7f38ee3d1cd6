/** Outcome of a sync operation; failures are values, never thrown */
export type DataResult<T> =
  | { readonly type: 'success'; readonly data: T; readonly message: string }
  | { readonly type: 'error'; readonly message: string };

export function isError<T>(r: DataResult<T>): r is Extract<DataResult<T>, { type: 'error' }> {
  return r.type === 'error';
}
