import {
  Entity,
  PrimaryColumn,
  Column,
  Index,
  CreateDateColumn,
} from 'typeorm';
import type { IStageDetectionParameters, IStageSummary } from '../../stages/models';

/**
 * Resumen serializado en jsonb (las fechas van como ISO string)
 */
export type RideSummaryColumn = Omit<IStageSummary, 'startTime' | 'endTime'> & {
  startTime: string;
  endTime: string;
};

@Entity('rides')
@Index(['start_time'])
export class Ride {
  // Lo asigna el análisis (se devuelve antes de persistir)
  @PrimaryColumn('uuid')
  id!: string;

  @Column({ type: 'text', nullable: true })
  name!: string | null;

  @Column({ type: 'timestamptz', name: 'start_time' })
  start_time!: Date;

  @Column({ type: 'timestamptz', name: 'end_time' })
  end_time!: Date;

  @Column({ type: 'int', name: 'original_point_count' })
  original_point_count!: number;

  @Column({ type: 'int', name: 'analysed_point_count' })
  analysed_point_count!: number;

  @Column({ type: 'float8', name: 'tolerance_metres', nullable: true })
  tolerance_metres!: number | null;

  @Column({ type: 'float8', default: 0 })
  distance!: number;

  @Column({ type: 'int', default: 0 })
  duration!: number;

  @Column({ type: 'int', name: 'control_count', default: 0 })
  control_count!: number;

  @Column({ type: 'jsonb' })
  parameters!: IStageDetectionParameters;

  @Column({ type: 'jsonb' })
  summary!: RideSummaryColumn;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  created_at!: Date;
}
