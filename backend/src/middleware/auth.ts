import { NextFunction, Request, RequestHandler, Response } from 'express';
import { AppContext, sendResult } from '../routes (APIs)/http';
import { authenticate as resolveActor } from '../services/authService';
import { requireCompany } from '../services/companyService';
import { err } from '../services/common';

const UNAUTHENTICATED = 'Autenticação necessária.';

/** Bearer token -> req.actor, with the company status checks applied on every request */
export function authenticate(ctx: AppContext): RequestHandler {
  const settings = { secretKey: ctx.config.secretKey, tokenTtlHours: ctx.config.tokenTtlHours };
  return (req: Request, res: Response, next: NextFunction) => {
    const result = resolveActor(ctx.db, settings, req.header('authorization'));
    if (!result.ok) return sendResult(res, result);
    req.actor = result.data;
    next();
  };
}

export const requireManager: RequestHandler = (req, res, next) => {
  if (!req.actor) return sendResult(res, err('UNAUTHENTICATED', UNAUTHENTICATED));
  if (!req.actor.isManager) {
    return sendResult(res, err('MANAGER_REQUIRED', 'Acesso restrito ao gerente da empresa.'));
  }
  next();
};

export const requireSuperuser: RequestHandler = (req, res, next) => {
  if (!req.actor) return sendResult(res, err('UNAUTHENTICATED', UNAUTHENTICATED));
  if (!req.actor.user.isSuperuser) {
    return sendResult(res, err('SUPERUSER_REQUIRED', 'Acesso restrito ao administrador do sistema.'));
  }
  next();
};

// Tenant endpoints need a company; a superuser without one gets COMPANY_REQUIRED
export const requireTenant: RequestHandler = (req, res, next) => {
  if (!req.actor) return sendResult(res, err('UNAUTHENTICATED', UNAUTHENTICATED));
  const tenant = requireCompany(req.actor);
  if (!tenant.ok) return sendResult(res, tenant);
  req.tenant = tenant.data;
  next();
};
