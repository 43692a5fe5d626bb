import {z} from 'zod';

export const signerErrorCodeSchema = z.enum([
  'invalid_input',
  'invalid_credential',
  'payload_not_serializable',
  'signing_failed'
]);

export type SignerErrorCode = z.infer<typeof signerErrorCodeSchema>;

export type SignerError = {
  code: SignerErrorCode;
  message: string;
};

export type SignerSuccess<T> = {
  ok: true;
  value: T;
};

export type SignerFailure = {
  ok: false;
  error: SignerError;
};

export type SignerResult<T> = SignerSuccess<T> | SignerFailure;

export const ok = <T>(value: T): SignerSuccess<T> => ({ok: true, value});

export const err = (code: SignerErrorCode, message: string): SignerFailure => ({
  ok: false,
  error: {code, message}
});
