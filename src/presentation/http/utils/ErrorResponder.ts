import { Response } from 'express';
import { HTTP_STATUS } from '../constants/HttpConstants';

/**
 * Sends the proxy's own error responses consistently
 */
export class ErrorResponder {
  /**
   * Sends `{ error }` with the given status, or drops the connection if the
   * upstream response has already started
   */
  static sendError(res: Response, error: string, status: number = HTTP_STATUS.INTERNAL_SERVER_ERROR): void {
    if (res.headersSent) {
      res.destroy();
      return;
    }
    res.status(status).json({ error });
  }
}
