// fs errors can come from another realm (Jest's module sandbox), so check
// their shape rather than `instanceof Error`.
export const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  typeof error === 'object' && error !== null && 'code' in error;

export const hasErrorCode = (error: unknown, ...codes: string[]) =>
  isErrnoException(error) && typeof error.code === 'string' && codes.includes(error.code);

export const describeError = (error: unknown) => {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
};
