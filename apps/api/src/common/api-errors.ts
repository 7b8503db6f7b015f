// apps/api/src/common/api-errors.ts
import {
  BadGatewayException,
  BadRequestException,
  ConflictException,
  ForbiddenException,
  HttpException,
  HttpStatus,
  InternalServerErrorException,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';

/** Machine-readable failure codes carried in the error envelope. */
export type ApiErrorCode =
  | 'unauthorized'
  | 'tenant_required'
  | 'tenant_not_found'
  | 'not_a_member'
  | 'forbidden'
  | 'order_not_found'
  | 'rate_limit_exceeded'
  | 'invalid_items'
  | 'validation_failed'
  | 'order_error'
  | 'amount_too_small'
  | 'payment_error'
  | 'payment_not_succeeded'
  | 'payment_mismatch'
  | 'order_already_paid'
  | 'service_unavailable';

type Extra = Record<string, unknown>;

const body = (code: ApiErrorCode, message: string, extra?: Extra) => ({
  code,
  message,
  ...extra,
});

export const tenantRequired = () =>
  new BadRequestException(
    body('tenant_required', 'No tenant could be resolved for this request'),
  );

export const tenantNotFound = (tenantId: string) =>
  new NotFoundException(
    body('tenant_not_found', 'Tenant not found or inactive', { tenantId }),
  );

export const notAMember = () =>
  new ForbiddenException(
    body('not_a_member', 'You are not an active member of this tenant'),
  );

export const forbidden = (message: string) =>
  new ForbiddenException(body('forbidden', message));

export const orderNotFound = (orderId: string) =>
  new NotFoundException(body('order_not_found', 'Order not found', { orderId }));

export const rateLimited = (retryAfter: number, resetAt: Date) =>
  new HttpException(
    body('rate_limit_exceeded', 'Too many requests, please retry later', {
      retryAfter,
      resetAt: resetAt.toISOString(),
    }),
    HttpStatus.TOO_MANY_REQUESTS,
  );

export const invalidItems = (missing: {
  menuItemIds: string[];
  sizeIds: string[];
  ingredientIds: string[];
}) =>
  new BadRequestException(
    body('invalid_items', 'Some items are not available in this menu', {
      menuItemIds: missing.menuItemIds,
      sizeIds: missing.sizeIds,
      ingredientIds: missing.ingredientIds,
    }),
  );

export const orderError = (message: string, extra?: Extra) =>
  new InternalServerErrorException(body('order_error', message, extra));

export const amountTooSmall = (
  orderId: string,
  amountMinor: number,
  minimumMinor: number,
) =>
  new BadRequestException(
    body('amount_too_small', 'Order total is below the card payment minimum', {
      orderId,
      amountMinor,
      minimumMinor,
    }),
  );

export const paymentError = (orderId: string, reason: string) =>
  new BadGatewayException(
    body('payment_error', 'Payment could not be initialised', {
      orderId,
      reason,
    }),
  );

export const paymentNotSucceeded = (status: string) =>
  new BadRequestException(
    body('payment_not_succeeded', 'Payment has not succeeded', { status }),
  );

export const paymentMismatch = (message: string) =>
  new BadRequestException(body('payment_mismatch', message));

export const orderAlreadyPaid = (orderId: string) =>
  new ConflictException(
    body('order_already_paid', 'Order is already paid', { orderId }),
  );

export const serviceUnavailable = (message: string, extra?: Extra) =>
  new ServiceUnavailableException(body('service_unavailable', message, extra));
