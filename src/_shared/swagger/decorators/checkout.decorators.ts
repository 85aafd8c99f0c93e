import { applyDecorators } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { CheckoutResponseDto, CreateCheckoutDto } from '../../dto/checkout.dto';

/**
 * Swagger decorator for checkout session creation
 */
export const ApiCreateCheckout = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Create a hosted checkout session',
      description:
        'Registers the payment with the gateway and returns the page to redirect the payer to.',
    }),
    ApiBody({ type: CreateCheckoutDto }),
    ApiResponse({
      status: 201,
      description: 'Session created',
      type: CheckoutResponseDto,
    }),
    ApiResponse({ status: 400, description: 'Invalid checkout request' }),
    ApiResponse({
      status: 502,
      description: 'Gateway rejected the session or could not be reached',
    }),
  );
};
