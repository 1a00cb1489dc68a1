/**
 * Normalises a thrown value into an `Error`. Non-error values are kept as the
 * `cause` so the original payload (a driver error code, a rejected failure
 * object) still reaches the logs.
 */
export const ensureError = (value: unknown, fallbackMessage = 'Unknown error'): Error => {
  if (value instanceof Error) {
    return value;
  }

  if (typeof value === 'string') {
    return new Error(value.length > 0 ? value : fallbackMessage);
  }

  if (value && typeof value === 'object' && 'message' in value) {
    const { message } = value;
    return new Error(typeof message === 'string' && message.length > 0 ? message : fallbackMessage, {
      cause: value,
    });
  }

  return new Error(fallbackMessage, value === undefined ? undefined : { cause: value });
};
