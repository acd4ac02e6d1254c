/**
 * CORS Middleware Configuration
 * Handles cross-origin resource sharing for the API
 */
import cors from "cors";
import { config } from "../config.js";

/**
 * Get allowed origins from configuration
 */
const getAllowedOrigins = (): string[] => {
  const origins: string[] = [
    'http://localhost:3000',
    'http://localhost:3001',
    'http://localhost:3002',
    'http://localhost:3003',
  ];

  // Add production frontend URL from environment variable
  if (config.frontendUrl) {
    origins.push(config.frontendUrl);
  }

  return origins;
};

/**
 * CORS configuration
 */
export const corsConfig = cors({
  origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
    // Allow requests with no origin (curl, server-to-server)
    if (!origin) {
      return callback(null, true);
    }

    if (getAllowedOrigins().includes(origin)) {
      return callback(null, true);
    }

    // Allow localhost on any port in development
    if (config.nodeEnv !== 'production' && origin.includes('localhost')) {
      return callback(null, true);
    }

    console.warn('CORS blocked origin:', origin);
    callback(new Error('Not allowed by CORS'));
  },
  methods: ['GET', 'POST', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Accept', 'Origin'],
  optionsSuccessStatus: 200,
});
