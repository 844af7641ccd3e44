import express from 'express';
import cors from 'cors';
import { getServerConfig } from './config';
import { requestLogger } from './middleware/requestLogger';
import { createChatbotRouter, RagFallback } from './routes/chatbotRoutes';
import type { InventoryDataService } from './services/chatbotData';

export interface AppDependencies {
  dataService: InventoryDataService;
  askRag?: RagFallback;
}

export function createApp({ dataService, askRag }: AppDependencies) {
  const app = express();
  const { corsOrigin } = getServerConfig();

  const allowedOrigins = ['http://localhost:3000', 'http://localhost:5173', corsOrigin].filter(
    (origin): origin is string => Boolean(origin)
  );

  const corsOptions: cors.CorsOptions = {
    origin: (origin, callback) => {
      // Allow requests with no origin (webhooks, curl, same-origin)
      if (!origin || allowedOrigins.includes(origin)) {
        return callback(null, true);
      }
      return callback(null, false);
    },
  };

  app.use(cors(corsOptions));
  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger());

  app.use('/api/chatbot', createChatbotRouter(dataService, askRag));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
