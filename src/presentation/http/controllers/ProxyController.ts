import { Request, Response } from 'express';
import { RewriteAnnounceUseCase } from '../../../application/use-cases/RewriteAnnounceUseCase';
import { ILogger, ITrackerForwarder } from '../../../domain/interfaces';
import { ProxyTarget } from '../../../domain/value-objects';
import { ProxyTargetError, UpstreamUnavailableError } from '../../../domain/errors';
import { HTTP_STATUS } from '../constants/HttpConstants';
import { ErrorResponder } from '../utils/ErrorResponder';

/**
 * Controller for proxied requests
 * Runs every request through announce rewriting and hands it to the forwarder
 */
export class ProxyController {
    constructor(
        private rewriteAnnounceUseCase: RewriteAnnounceUseCase,
        private forwarder: ITrackerForwarder,
        private logger: ILogger
    ) { }

    /**
     * Handles any method on any target, e.g. GET http://tracker/announce?info_hash=...
     */
    async handle(req: Request, res: Response): Promise<void> {
        // originalUrl is the request target exactly as the client sent it
        const rawTarget = req.originalUrl;

        let destination: ProxyTarget;
        try {
            destination = ProxyTarget.parse(rawTarget, req.headers.host);
        } catch (error) {
            if (error instanceof ProxyTargetError) {
                ErrorResponder.sendError(res, error.message, HTTP_STATUS.BAD_REQUEST);
                return;
            }
            throw error;
        }

        const result = await this.rewriteAnnounceUseCase.execute({ method: req.method, target: rawTarget });
        if (result.rewritten) {
            destination = destination.retarget(result.target);
        }

        // The client may have left while the announce waited on its torrent's lock
        if (req.destroyed || res.destroyed || res.writableEnded) {
            this.logger.debug(`Client closed before forwarding to ${destination.authority}`);
            return;
        }

        try {
            await this.forwarder.forward(req, res, destination);
        } catch (error) {
            if (error instanceof UpstreamUnavailableError) {
                this.logger.error(`Upstream tracker unavailable: ${error.message}`);
                ErrorResponder.sendError(
                    res,
                    error.message,
                    error.timedOut ? HTTP_STATUS.GATEWAY_TIMEOUT : HTTP_STATUS.BAD_GATEWAY
                );
                return;
            }
            throw error;
        }
    }
}
