import { applyDecorators } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiQuery, ApiResponse } from '@nestjs/swagger';
import { CallbackOutcome } from '../../../core';

const callbackBody = ApiBody({
  description: 'Form-encoded notification posted by the gateway',
  required: true,
  schema: {
    type: 'object',
    additionalProperties: true,
    example: {
      tran_id: 'ORDER-42-1700000000',
      val_id: '231116123456ABCD',
      value_a: '42',
      status: 'VALID',
      amount: '1500.00',
      currency: 'BDT',
      store_amount: '1462.50',
      verify_key: 'amount,currency,status,tran_id,val_id,value_a',
      verify_sign: '0f1e2d3c4b5a69788796a5b4c3d2e1f0',
    },
  },
});

const callbackResponse = ApiResponse({
  status: 200,
  description:
    'Delivery processed; always 200 so the gateway does not retry. The outcome names what happened.',
  schema: {
    type: 'object',
    required: ['outcome', 'message', 'processingId'],
    properties: {
      outcome: {
        type: 'string',
        enum: Object.values(CallbackOutcome),
      },
      message: { type: 'string' },
      processingId: { type: 'string', format: 'uuid' },
    },
  },
});

/**
 * Swagger decorator for the redirect-back landing
 */
export const ApiCallbackEndpoint = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Receive payer redirect-back',
      description:
        'Only the success landing is processed: the notification is validated against the gateway and applied to the order.',
    }),
    ApiQuery({
      name: 'order_placement',
      required: false,
      description: 'Landing variant',
      example: 'success',
    }),
    callbackBody,
    callbackResponse,
  );
};

/**
 * Swagger decorator for the server-to-server IPN
 */
export const ApiIpnEndpoint = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Receive instant payment notification',
      description:
        'Server-to-server notification; processed like the success landing.',
    }),
    callbackBody,
    callbackResponse,
  );
};
