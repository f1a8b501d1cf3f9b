import { Router } from 'express';
import { createEmailController } from '../controllers/emailController';
import { createPasswordController } from '../controllers/passwordController';
import { createScanController } from '../controllers/scanController';
import { createUrlController } from '../controllers/urlController';
import { asyncHandler } from '../middleware/asyncHandler';
import type { BreachChecker } from '../services/breachChecker';
import type { PasswordAnalyzer } from '../services/passwordAnalyzer';
import type { ScanOrchestrator } from '../services/scanOrchestrator';
import type { UrlChecker } from '../services/urlChecker';

export interface RouteDeps {
  breachChecker: BreachChecker;
  urlChecker: UrlChecker;
  passwordAnalyzer: PasswordAnalyzer;
  orchestrator: ScanOrchestrator;
}

export const createRoutes = ({
  breachChecker,
  urlChecker,
  passwordAnalyzer,
  orchestrator,
}: RouteDeps): Router => {
  const router = Router();
  const { checkEmail } = createEmailController(breachChecker);
  const { checkUrl } = createUrlController(urlChecker);
  const { checkPassword, generatePassword } = createPasswordController(passwordAnalyzer);
  const { scanWebsite, scanProgress, scanHistory, scanResult, scanReport } =
    createScanController(orchestrator);

  router.post('/check-email', asyncHandler(checkEmail));
  router.post('/check-url', asyncHandler(checkUrl));
  router.post('/check-password', asyncHandler(checkPassword));
  router.post('/generate-password', asyncHandler(generatePassword));
  router.post('/scan-website', asyncHandler(scanWebsite));
  router.get('/scan-progress/:scanId', asyncHandler(scanProgress));
  router.get('/scan-history', asyncHandler(scanHistory));
  router.get('/scan-history/:scanId', asyncHandler(scanResult));
  router.get('/generate-report/:scanId', asyncHandler(scanReport));

  return router;
};
