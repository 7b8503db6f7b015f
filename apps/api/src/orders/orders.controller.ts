// apps/api/src/orders/orders.controller.ts
import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  Req,
  UseGuards,
} from '@nestjs/common';
import {
  PlaceOrderSchema,
  type PaymentRetryResponse,
  type PlaceOrderInput,
  type PlaceOrderResponse,
  type VerifyPaymentResponse,
} from '@shared/order';
import {
  BearerAuthGuard,
  requireUser,
  type AuthenticatedRequest,
} from '../auth/bearer-auth.guard';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';
import { PaymentRetryDto, VerifyPaymentDto } from './dto/payment-request.dto';
import { OrderPaymentsService } from './order-payments.service';
import { PlaceOrderService } from './place-order.service';

const orderIdPipe = new ParseUUIDPipe({
  exceptionFactory: () =>
    new BadRequestException({
      code: 'validation_failed',
      message: 'orderId must be a UUID',
    }),
});

@Controller('orders')
@UseGuards(BearerAuthGuard)
export class OrdersController {
  constructor(
    private readonly placeOrderService: PlaceOrderService,
    private readonly payments: OrderPaymentsService,
  ) {}

  /** Places a new order, or edits one when the body carries `orderId`. */
  @Post()
  @HttpCode(HttpStatus.OK)
  placeOrder(
    @Req() req: AuthenticatedRequest,
    @Body(new ZodValidationPipe(PlaceOrderSchema)) body: PlaceOrderInput,
  ): Promise<PlaceOrderResponse> {
    return this.placeOrderService.placeOrder(requireUser(req), body);
  }

  @Post(':orderId/payment')
  @HttpCode(HttpStatus.OK)
  retryPayment(
    @Req() req: AuthenticatedRequest,
    @Param('orderId', orderIdPipe) orderId: string,
    @Body() body: PaymentRetryDto,
  ): Promise<PaymentRetryResponse> {
    return this.payments.retry(requireUser(req), orderId, body.tenantId);
  }

  @Post(':orderId/verify-payment')
  @HttpCode(HttpStatus.OK)
  verifyPayment(
    @Req() req: AuthenticatedRequest,
    @Param('orderId', orderIdPipe) orderId: string,
    @Body() body: VerifyPaymentDto,
  ): Promise<VerifyPaymentResponse> {
    return this.payments.verify(
      requireUser(req),
      orderId,
      body.paymentIntentId,
      body.tenantId,
    );
  }
}
