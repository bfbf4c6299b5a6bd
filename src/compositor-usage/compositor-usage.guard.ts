import { CanActivate, ExecutionContext, HttpException, Injectable, SetMetadata } from '@nestjs/common'
import { Reflector } from '@nestjs/core'
import type { Request } from 'express'
import { CompositorUsageService } from './compositor-usage.service'
import type { UsageKind } from './compositor-usage.types'

export const CLIENT_ID_HEADER = 'x-client-id'

const USAGE_KIND_KEY = 'compositorUsageKind'

/** Marks a handler as spending one request of the given kind from the daily allowance. */
export const CompositorUsage = (kind: UsageKind) => SetMetadata(USAGE_KIND_KEY, kind)

export function clientKeyFor(req: Pick<Request, 'headers' | 'ip'>): string {
  const header = req.headers[CLIENT_ID_HEADER]
  const clientId = Array.isArray(header) ? header[0] : header
  if (clientId && clientId.trim().length > 0) return `client:${clientId.trim()}`
  return `ip:${req.ip ?? 'unknown'}`
}

@Injectable()
export class CompositorUsageGuard implements CanActivate {
  constructor(
    private readonly usage: CompositorUsageService,
    private readonly reflector: Reflector,
  ) {}

  canActivate(ctx: ExecutionContext): boolean {
    const kind = this.reflector.get<UsageKind | undefined>(USAGE_KIND_KEY, ctx.getHandler())
    if (!kind) return true

    const req = ctx.switchToHttp().getRequest<Request>()
    const decision = this.usage.reserve(clientKeyFor(req), kind)
    if (decision.allowed) return true

    if (decision.reason === 'disabled') {
      throw new HttpException({ statusCode: 429, message: `${label(kind)} disabled by configuration` }, 429)
    }
    throw new HttpException(
      {
        statusCode: 429,
        message: `Daily ${kind} limit exceeded`,
        kind,
        limit: decision.limit,
        used: decision.used,
        resetAtIso: decision.resetAtIso,
      },
      429,
    )
  }
}

function label(kind: UsageKind): string {
  return kind === 'preview' ? 'Route previews' : 'Plan generation'
}
