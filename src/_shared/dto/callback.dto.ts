import { IsOptional, IsString } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { CallbackOutcome } from '../../core';

/**
 * Query flags on the redirect-back landing
 */
export class CallbackQueryDto {
  @ApiPropertyOptional({
    description: 'Which landing the payer returned to',
    example: 'success',
  })
  @IsOptional()
  @IsString()
  order_placement?: string;
}

/**
 * Response DTO for callback processing
 */
export class CallbackResponseDto {
  @ApiProperty({
    description: 'Fate of this delivery',
    enum: CallbackOutcome,
    example: CallbackOutcome.RECONCILED,
  })
  outcome!: CallbackOutcome;

  @ApiProperty({
    description: 'Human-readable description of the outcome',
    example: 'Payment validated and applied to the order',
  })
  message!: string;

  @ApiProperty({
    description: 'Identifier of this processing run, for log correlation',
    example: '4b1e5c1e-8f0a-4a9e-9d7e-3f3f0e7d9a11',
  })
  processingId!: string;

  @ApiPropertyOptional({
    description: 'Why processing stopped; only returned in debug mode',
    example: 'amount_mismatch',
  })
  reason?: string;
}
