import 'reflect-metadata';
import express from 'express';
import cors from 'cors';
import { useContainer, useExpressServer } from 'routing-controllers';
import { Container } from 'typedi';
import { AppConfig, AppConfigToken } from './config';
import { ChatController } from './controllers/ChatController';
import { HealthController } from './controllers/HealthController';
import { ErrorHandler } from './middlewares/ErrorHandler';
import { OpenAiCompatibleBackend } from './services/inference/OpenAiCompatibleBackend';
import { InferenceBackendToken } from './services/inference/types';
import { ClockToken, systemClock } from './utils/clock';

useContainer(Container);

/**
 * Registers process-wide values in the container. Anything already set under
 * a token (a test double, for instance) is left in place.
 */
export function configureContainer(config: AppConfig): void {
    Container.set(AppConfigToken, config);
    if (!Container.has(ClockToken)) {
        Container.set(ClockToken, systemClock);
    }
    if (!Container.has(InferenceBackendToken)) {
        Container.set(InferenceBackendToken, Container.get(OpenAiCompatibleBackend));
    }
}

export function createApp(config: AppConfig): express.Express {
    configureContainer(config);

    const app = express();
    app.use(cors());

    useExpressServer(app, {
        controllers: [ChatController, HealthController],
        middlewares: [ErrorHandler],
        defaultErrorHandler: false,
        validation: {
            whitelist: true,
            forbidNonWhitelisted: true,
            validationError: { target: false },
        },
        classTransformer: true,
    });

    return app;
}
