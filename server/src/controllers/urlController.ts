import type { Request, Response } from 'express';
import { InvalidInputError } from '../errors/AppError';
import type { UrlChecker } from '../services/urlChecker';

export const createUrlController = (urlChecker: UrlChecker) => {
  const checkUrl = async (req: Request, res: Response): Promise<void> => {
    const url: unknown = req.body?.url;
    if (typeof url !== 'string' || !url.trim()) {
      throw new InvalidInputError('URL is required.');
    }
    res.status(200).json(urlChecker.check(url));
  };

  return { checkUrl };
};
