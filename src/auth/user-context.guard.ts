import {
  BadRequestException,
  CanActivate,
  ExecutionContext,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common'
import type { Request } from 'express'

export const USER_ID_HEADER = 'x-user-id'

const USER_ID_RE = /^[A-Za-z0-9_-]{1,64}$/

export type AuthedRequest = Request & {
  authUser?: {
    userId?: string
  }
}

/**
 * Sessions are issued upstream; by the time a request reaches the engine the
 * gateway has put the authenticated user id in a header.
 */
@Injectable()
export class UserContextGuard implements CanActivate {
  canActivate(ctx: ExecutionContext): boolean {
    const req = ctx.switchToHttp().getRequest<AuthedRequest>()
    const userId = (req.header(USER_ID_HEADER) ?? '').trim()

    if (!userId) {
      throw new UnauthorizedException('MISSING_USER_CONTEXT')
    }
    if (!USER_ID_RE.test(userId)) {
      throw new UnauthorizedException('INVALID_USER_CONTEXT')
    }

    req.authUser = { userId }
    return true
  }
}

export function getUserId(req: AuthedRequest): string {
  const userId = req.authUser?.userId
  if (!userId) throw new BadRequestException('Missing userId in request context')
  return userId
}
