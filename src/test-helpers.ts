import { ConversionError } from './errors';

export const catchConversionError = async (fn: () => unknown): Promise<ConversionError> => {
  try {
    await fn();
  } catch (err) {
    if (err instanceof ConversionError) return err;
    throw err;
  }
  throw new Error('Expected a ConversionError to be thrown.');
};
