import rateLimit from 'express-rate-limit';

export const createLimiter = ({ max, windowMs }: { max: number; windowMs: number }) =>
  rateLimit({
    windowMs,
    limit: max,
    standardHeaders: 'draft-7',
    legacyHeaders: false,
    message: {
      status: 'fail',
      code: 'RATE_LIMITED',
      message: 'Too many requests from this IP, please try again later.',
    },
  });
