import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';

export const TRACE_ID_HEADER = 'x-trace-id';

export function traceId(req: Request, res: Response, next: NextFunction) {
  const incomingTraceId = req.get(TRACE_ID_HEADER);
  const newTraceId = incomingTraceId || uuidv4();
  req.trace_id = newTraceId;
  res.setHeader(TRACE_ID_HEADER, newTraceId);
  next();
}
