import type { Request, Response } from 'express';
import { InvalidInputError, NotFoundError } from '../errors/AppError';
import { formatScanReport } from '../services/notificationService';
import type { ScanOrchestrator } from '../services/scanOrchestrator';
import type { HistoryQuery } from '../types/scan';

const readCount = (value: unknown, name: string): number | undefined => {
  if (value === undefined) return undefined;
  const parsed = typeof value === 'string' ? Number(value) : NaN;
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidInputError(`${name} must be a non-negative integer`);
  }
  return parsed;
};

export const createScanController = (orchestrator: ScanOrchestrator) => {
  const scanWebsite = async (req: Request, res: Response): Promise<void> => {
    const clientIp = req.ip ?? req.socket.remoteAddress ?? 'unknown';
    const response = await orchestrator.startScan(req.body, clientIp);
    res.status(200).json(response);
  };

  const scanProgress = async (req: Request, res: Response): Promise<void> => {
    const progress = orchestrator.getProgress(req.params.scanId);
    if (!progress) {
      throw new NotFoundError(`No scan in progress with id ${req.params.scanId}`);
    }
    res.status(200).json(progress);
  };

  const scanHistory = async (req: Request, res: Response): Promise<void> => {
    const query: HistoryQuery = {
      limit: readCount(req.query.limit, 'limit'),
      skip: readCount(req.query.skip, 'skip'),
    };
    res.status(200).json(await orchestrator.listHistory(query));
  };

  const scanResult = async (req: Request, res: Response): Promise<void> => {
    const result = await orchestrator.getResult(req.params.scanId);
    if (!result) {
      throw new NotFoundError(`No scan result with id ${req.params.scanId}`);
    }
    res.status(200).json(result);
  };

  const scanReport = async (req: Request, res: Response): Promise<void> => {
    const result = await orchestrator.getResult(req.params.scanId);
    if (!result) {
      throw new NotFoundError(`No scan result with id ${req.params.scanId}`);
    }
    res.status(200).type('text/plain').send(formatScanReport(result));
  };

  return { scanWebsite, scanProgress, scanHistory, scanResult, scanReport };
};
