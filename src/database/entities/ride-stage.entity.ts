import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  Index,
  CreateDateColumn,
} from 'typeorm';

@Entity('ride_stages')
@Index(['ride_id', 'sequence'])
export class RideStage {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid', name: 'ride_id' })
  @Index()
  ride_id!: string;

  // Posición del stage dentro del ride (0..n-1)
  @Column({ type: 'int' })
  sequence!: number;

  @Column({ type: 'text', name: 'stage_type' })
  stage_type!: string; // 'Moving' | 'Control'

  @Column({ type: 'int', name: 'start_index' })
  start_index!: number;

  @Column({ type: 'int', name: 'end_index' })
  end_index!: number;

  @Column({ type: 'timestamptz', name: 'start_time' })
  start_time!: Date;

  @Column({ type: 'timestamptz', name: 'end_time' })
  end_time!: Date;

  @Column({ type: 'int', default: 0 })
  duration!: number;

  @Column({ type: 'float8', default: 0 })
  distance!: number;

  @Column({ type: 'float8', default: 0 })
  ascent!: number;

  @Column({ type: 'float8', default: 0 })
  descent!: number;

  @Column({ type: 'float8', name: 'avg_speed', default: 0 })
  avg_speed!: number;

  @Column({ type: 'float8', name: 'max_speed', default: 0 })
  max_speed!: number;

  @Column({ type: 'float8', name: 'start_lat' })
  start_lat!: number;

  @Column({ type: 'float8', name: 'start_lon' })
  start_lon!: number;

  @Column({ type: 'float8', name: 'end_lat' })
  end_lat!: number;

  @Column({ type: 'float8', name: 'end_lon' })
  end_lon!: number;

  @Column({ type: 'text', name: 'start_place', nullable: true })
  start_place!: string | null;

  @Column({ type: 'text', name: 'end_place', nullable: true })
  end_place!: string | null;

  @Column({ type: 'text', name: 'anchor_place', nullable: true })
  anchor_place!: string | null;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  created_at!: Date;
}
