import type { NextFunction, Request, Response } from 'express';
import { validationResult } from 'express-validator';

export const handleValidation = (req: Request, res: Response, next: NextFunction) => {
  const errors = validationResult(req);
  if (!errors.isEmpty()) {
    const [first] = errors.array();
    return res.status(400).json({ error: first.msg, code: 'InvalidData', details: errors.array() });
  }
  next();
};
