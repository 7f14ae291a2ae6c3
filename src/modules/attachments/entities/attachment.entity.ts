import {
    Column,
    CreateDateColumn,
    Entity,
    PrimaryColumn,
    UpdateDateColumn,
} from 'typeorm';

@Entity('attachments')
export class Attachment {
    // Assigned before insert so the storage key is known up front
    @PrimaryColumn('uuid')
    id!: string;

    @Column()
    filename!: string;

    @Column({ name: 'content_type' })
    contentType!: string;

    @Column({ type: 'int' })
    size!: number;

    @Column({ name: 'storage_key' })
    storageKey!: string;

    @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
    createdAt!: Date;

    @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
    updatedAt!: Date;
}
