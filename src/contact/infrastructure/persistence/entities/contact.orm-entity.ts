import {
  Entity,
  Column,
  CreateDateColumn,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { Email, EmailColumn } from '../../../../email';

@Entity('contacts')
export class ContactOrmEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column()
  name!: string;

  @EmailColumn({ unique: true })
  email!: Email;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
