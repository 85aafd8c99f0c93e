import {
  BadGatewayException,
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  UsePipes,
  ValidationPipe,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { InitiationError } from '../../../core';
import {
  ApiCreateCheckout,
  CheckoutResponseDto,
  CreateCheckoutDto,
} from '../../../_shared';
import { SslcommerzService } from '../services/sslcommerz.service';

/**
 * Checkout Controller
 *
 * Starts a hosted payment for an existing order
 */
@ApiTags('Checkout')
@Controller('sslcommerz')
export class CheckoutController {
  constructor(private readonly sslcommerzService: SslcommerzService) {}

  @Post('checkout')
  @HttpCode(HttpStatus.CREATED)
  @UsePipes(new ValidationPipe({ transform: true, whitelist: true }))
  @ApiCreateCheckout()
  async createCheckout(
    @Body() dto: CreateCheckoutDto,
  ): Promise<CheckoutResponseDto> {
    try {
      return await this.sslcommerzService.createCheckout({
        orderId: dto.orderId,
        amount: dto.amount,
        currency: dto.currency,
        customer: dto.customer,
        billingAddress: dto.billingAddress,
        description: dto.description,
        storeName: dto.storeName,
      });
    } catch (error) {
      if (error instanceof InitiationError) {
        throw new BadGatewayException(error.message);
      }
      throw error;
    }
  }
}
