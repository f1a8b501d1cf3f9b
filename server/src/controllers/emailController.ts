import type { Request, Response } from 'express';
import { InvalidInputError } from '../errors/AppError';
import type { BreachChecker } from '../services/breachChecker';

export const createEmailController = (breachChecker: BreachChecker) => {
  const checkEmail = async (req: Request, res: Response): Promise<void> => {
    const email: unknown = req.body?.email;
    if (typeof email !== 'string' || !email.trim()) {
      throw new InvalidInputError('Email is required.');
    }
    res.status(200).json(breachChecker.check(email));
  };

  return { checkEmail };
};
