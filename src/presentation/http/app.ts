import express, { Express, NextFunction, Request, Response } from 'express';
import { RewriteAnnounceUseCase } from '../../application/use-cases/RewriteAnnounceUseCase';
import { ILogger, ITrackerForwarder } from '../../domain/interfaces';
import { ProxyController } from './controllers/ProxyController';
import { createProxyRoutes } from './routes/proxy.routes';
import { ErrorResponder } from './utils/ErrorResponder';

export interface AppDependencies {
    rewriteAnnounceUseCase: RewriteAnnounceUseCase;
    forwarder: ITrackerForwarder;
    logger: ILogger;
}

/**
 * Creates and configures Express application
 * Can be used both for production server and testing
 */
export function createApp(deps: AppDependencies): Express {
    const proxyController = new ProxyController(deps.rewriteAnnounceUseCase, deps.forwarder, deps.logger);

    const app: Express = express();

    // Responses relayed from the tracker must not gain headers on the way
    app.disable('x-powered-by');
    app.disable('etag');

    app.use('/', createProxyRoutes(proxyController));

    // One failed request never affects other connections
    app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
        deps.logger.error(`Unhandled error proxying ${req.method} ${req.originalUrl.slice(0, 120)}:`, error);
        ErrorResponder.sendError(res, 'Internal proxy error');
    });

    return app;
}
