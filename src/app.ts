import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';
import { AppConfig } from './config';
import { errorHandler, notFound } from './middleware/errorHandler';
import { createReportRoutes } from './routes/reportRoutes';
import { RosterReportService } from './services/rosterReportService';
import { httpLogStream } from './utils/logger';

export function createApp(config: Readonly<AppConfig>, service: RosterReportService): Express {
  const app = express();

  // Security middleware
  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"]
      }
    },
    crossOriginEmbedderPolicy: false
  }));

  // CORS configuration
  app.use(cors({
    origin: config.corsOrigin,
    credentials: true,
    optionsSuccessStatus: 200,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-File-Name'],
    exposedHeaders: ['Content-Disposition']
  }));

  // Rate limiting
  const limiter = rateLimit({
    windowMs: config.rateLimitWindowMs,
    max: config.rateLimitMaxRequests,
    message: 'Too many requests from this IP, please try again later.',
    standardHeaders: true,
    legacyHeaders: false
  });
  app.use(`/api/${config.apiVersion}/`, limiter);

  // Compression middleware
  app.use(compression());

  // HTTP request logging
  if (config.nodeEnv !== 'test') {
    app.use(morgan('combined', { stream: httpLogStream }));
  }

  // Health check endpoint
  app.get('/health', (req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.nodeEnv
    });
  });

  // API Routes
  app.use(`/api/${config.apiVersion}/reports`, createReportRoutes(service, config.uploadLimit));

  // 404 handler
  app.use(notFound);

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
