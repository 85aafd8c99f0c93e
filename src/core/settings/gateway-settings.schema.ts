import { IsIn, IsNotEmpty, IsString } from 'class-validator';
import { GatewayEnvironment } from '../domain/enums';

/**
 * Shape of the persisted gateway settings once flattened
 */
export class GatewaySettingsSchema {
  @IsIn(Object.values(GatewayEnvironment))
  environment!: GatewayEnvironment;

  @IsString()
  @IsNotEmpty()
  store_id!: string;

  @IsString()
  @IsNotEmpty()
  store_password!: string;
}
