import 'dotenv/config';
import mongoose from 'mongoose';
import { createApp } from './app';
import { loadConfig } from './config';
import { InMemoryProgressStore } from './db/progressStore';
import {
  InMemoryScanHistoryStore,
  MongoScanHistoryStore,
  type ScanHistoryStore,
} from './db/scanResultService';
import { PhishingClassifier } from './ml/phishingClassifier';
import { ScanRateLimiter } from './scanner/safetyValidator';
import { WebsiteScanner, defaultScannerDeps } from './scanner/websiteScanner';
import { BreachChecker } from './services/breachChecker';
import { EmailScanNotifier } from './services/notificationService';
import { PasswordAnalyzer } from './services/passwordAnalyzer';
import { ScanOrchestrator } from './services/scanOrchestrator';
import { UrlChecker } from './services/urlChecker';
import { createLogger, errorMessage, setDefaultLogLevel } from './utils/logger';

const logger = createLogger({ component: 'SERVER' });

const connectHistoryStore = async (mongoUri: string | null): Promise<ScanHistoryStore> => {
  if (!mongoUri) {
    logger.warn('MONGODB_URI not set; scan history is kept in memory and lost on restart');
    return new InMemoryScanHistoryStore();
  }
  await mongoose.connect(mongoUri);
  logger.info('Connected to MongoDB');
  return new MongoScanHistoryStore();
};

const main = async () => {
  const config = loadConfig();
  setDefaultLogLevel(config.logLevel);

  const classifier = PhishingClassifier.fromFile(config.phishingModelPath);
  const breachChecker = BreachChecker.fromFile(config.breachDataPath);
  const passwordAnalyzer = PasswordAnalyzer.fromFile(config.passwordLexiconPath);
  const history = await connectHistoryStore(config.mongoUri);

  if (!config.mail) {
    logger.info('EMAIL_USER/EMAIL_PASS not set; scan summaries will not be mailed');
  }

  const orchestrator = new ScanOrchestrator({
    scanner: new WebsiteScanner(defaultScannerDeps(config.scanTimeoutMs)),
    history,
    progress: new InMemoryProgressStore(config.progressRetentionMs),
    rateLimiter: new ScanRateLimiter(config.scanRateLimitSeconds),
    notifier: config.mail ? new EmailScanNotifier(config.mail) : null,
  });

  const app = createApp({
    corsOrigins: config.corsOrigins,
    breachChecker,
    urlChecker: new UrlChecker(classifier),
    passwordAnalyzer,
    orchestrator,
  });

  const server = app.listen(config.port, () => {
    logger.info(`Server running on port ${config.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    server.close(() => {
      mongoose
        .disconnect()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error(`Error closing MongoDB connection: ${errorMessage(err)}`);
          process.exit(1);
        });
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
};

main().catch((err: unknown) => {
  logger.error(`Startup failed: ${errorMessage(err)}`);
  process.exit(1);
});
