import { HTTPResponse } from './response';
import { HTTPStatusError } from '../errors';

/**
 * Turns the raw transport result into the value a client call resolves to.
 * Handlers are pure; they hold no state and never see the client.
 */
export type ResponseHandler<T> = (response: HTTPResponse) => T;

/**
 * Return the response unchanged, whatever its status.
 */
export const echoHandler: ResponseHandler<HTTPResponse> = response => response;

/**
 * Return the response unchanged.
 *
 * @throws HTTPStatusError if the status is in the 4xx or 5xx range
 */
export const codeHandler: ResponseHandler<HTTPResponse> = response => {
  if (response.status >= 400 && response.status < 600) {
    throw new HTTPStatusError(response);
  }
  return response;
};

/**
 * Like {@link codeHandler}, but return the JSON-decoded body.
 *
 * @throws BodyDecodeError if the body is not valid JSON
 */
export const jsonHandler: ResponseHandler<unknown> = response => codeHandler(response).json();

export const responseHandlers = {
  echo: echoHandler,
  code: codeHandler,
  json: jsonHandler,
} as const;

export type ResponseHandlerName = keyof typeof responseHandlers;
