import { Entity, PrimaryColumn, Column, UpdateDateColumn } from 'typeorm';

/**
 * Key/value settings row; payment settings are stored as a JSON string
 */
@Entity('settings')
export class SettingEntity {
  @PrimaryColumn({ type: 'varchar', name: 'setting_name', length: 191 })
  name!: string;

  @Column({ type: 'text', name: 'setting_value' })
  value!: string;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
