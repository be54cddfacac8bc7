// src/main.ts
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';

type CorsOriginCallback = (err: Error | null, allow?: boolean) => void;

// http(s)://localhost, 127.0.0.1 or [::1], any port
const LOCAL_ORIGIN = /^https?:\/\/(localhost|\[::1\]|127\.0\.0\.1)(:\d+)?$/;

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, { cors: false });

  app.enableCors({
    origin(origin: string | undefined, cb: CorsOriginCallback): void {
      // No Origin header: curl and server-to-server calls
      if (origin == null || LOCAL_ORIGIN.test(origin)) {
        cb(null, true);
        return;
      }
      cb(new Error(`CORS: origin not allowed → ${String(origin)}`));
    },
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
    credentials: false,
    maxAge: 86_400,
  });

  // Validation pipe and error filter come from AppModule (APP_PIPE / APP_FILTER).
  app.enableShutdownHooks();

  const port = process.env.PORT ? Number(process.env.PORT) : 3000;
  await app.listen(port);
  Logger.log(`Listening on port ${port}`, 'Bootstrap');
}

void bootstrap();
