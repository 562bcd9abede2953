import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  ObjectIdColumn,
  UpdateDateColumn,
} from 'typeorm';
import { ObjectId } from 'mongodb';
import { UserRole } from '../enums/user-role.enum';

@Entity('users')
export class User {
  @ObjectIdColumn()
  _id!: ObjectId;

  /** Server-generated public identifier, distinct from the storage id */
  @Index({ unique: true })
  @Column()
  uuid!: string;

  @Index({ unique: true })
  @Column()
  email!: string;

  @Index({ unique: true })
  @Column()
  userName!: string;

  @Column()
  phoneNumber!: string;

  @Column()
  countryCode!: string;

  @Column({ nullable: true })
  name!: string | null;

  @Column()
  displayName!: string;

  @Column({ enum: UserRole, default: UserRole.RIDER })
  role!: UserRole;

  @Column({ default: true })
  isActive!: boolean;

  @Column({ default: false })
  isVerified!: boolean;

  @Column()
  passwordHash!: string;

  @Column({ nullable: true })
  profilePictureUrl!: string | null;

  @Column({ nullable: true })
  bio!: string | null;

  @Column({ nullable: true })
  website!: string | null;

  @Column({ nullable: true })
  location!: string | null;

  @Column({ nullable: true })
  socialLinks!: Record<string, string> | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;

  @Column({ nullable: true })
  createdBy!: string | null;

  @Column({ nullable: true })
  updatedBy!: string | null;
}
