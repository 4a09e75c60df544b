import { ApiError } from '@windmill/utils';

export const WINDMILL_API_NAME = 'WindmillAI';

/**
 * Raised when a request to the service fails. For HTTP failures the message is
 * the response body exactly as the server sent it.
 */
export class WindmillClientError extends ApiError {
  constructor(
    message: string,
    apiStatusCode?: number,
    apiResponse?: string,
    context?: Record<string, unknown>
  ) {
    super(message, WINDMILL_API_NAME, apiStatusCode, apiResponse, context);
  }
}

/**
 * Raised by a verified work unit lookup when the server does not know the
 * xid/wid pair.
 */
export class WorkUnitNotFoundError extends WindmillClientError {
  public readonly xid: string;
  public readonly wid: number;

  constructor(xid: string, wid: number) {
    super(`Work unit ${wid} of experiment '${xid}' does not exist`, undefined, undefined, {
      xid,
      wid,
    });
    this.xid = xid;
    this.wid = wid;
  }
}
