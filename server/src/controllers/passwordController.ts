import type { Request, Response } from 'express';
import { InvalidInputError } from '../errors/AppError';
import { type PasswordAnalyzer, readGenerateOptions } from '../services/passwordAnalyzer';

export const createPasswordController = (analyzer: PasswordAnalyzer) => {
  const checkPassword = async (req: Request, res: Response): Promise<void> => {
    const password: unknown = req.body?.password;
    if (typeof password !== 'string') {
      throw new InvalidInputError('Password is required.');
    }
    res.status(200).json(analyzer.analyze(password));
  };

  const generatePassword = async (req: Request, res: Response): Promise<void> => {
    res.status(200).json(analyzer.generate(readGenerateOptions(req.body)));
  };

  return { checkPassword, generatePassword };
};
