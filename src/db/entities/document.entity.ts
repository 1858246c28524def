import {
    Column,
    Entity,
    PrimaryGeneratedColumn,
    CreateDateColumn,
    UpdateDateColumn,
    ManyToOne,
    JoinColumn,
    Index
} from "typeorm";
import type { User } from "./user.entity";
import type { ShareType } from "../../types/document";

/**
 * Document Entity
 *
 * Metadata for an uploaded file. The bytes live in the object store under
 * minio_path; this row only points at them.
 *
 * Object keys look like `2026/10/19/1a2b3c4d/<file_uuid>.pdf`:
 * upload date, a short hash of the uploader's email, then the unique
 * file_uuid with the original extension.
 *
 * Sharing:
 * - is_shared + share_uuid: an active share link exists
 * - share_type: 'public' or 'with_password'
 * - share_code: four-digit code for 'with_password' shares
 * - share_expired_at: null means the link never expires
 *
 * Cancelling a share clears all five share columns.
 */
@Entity({ name: "documents" })
export class Document {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({
        type: "varchar",
        length: 255
    })
    filename!: string; // original name as uploaded

    @Column({
        type: "varchar",
        length: 32
    })
    file_md5!: string;

    @Column({
        type: "bigint",
        transformer: {
            to: (value: number) => value,
            from: (value: string | number) => Number(value)
        }
    })
    file_size!: number;

    @Column({
        type: "varchar",
        length: 255,
        default: "application/octet-stream"
    })
    mime_type!: string;

    @Column({
        type: "varchar",
        length: 500
    })
    minio_path!: string;

    @Column({
        type: "varchar",
        length: 36,
        unique: true
    })
    file_uuid!: string;

    @Index()
    @Column({ type: "int" })
    uploader_id!: number;

    @ManyToOne("User", "documents", { onDelete: "CASCADE" })
    @JoinColumn({ name: "uploader_id" })
    uploader?: User;

    @Column({
        type: "boolean",
        default: false
    })
    is_public!: boolean;

    @Column({
        type: "int",
        default: 0
    })
    download_count!: number;

    @Column({
        type: "boolean",
        default: false
    })
    is_shared!: boolean;

    @Column({
        type: "varchar",
        length: 36,
        unique: true,
        nullable: true
    })
    share_uuid!: string | null;

    @Column({
        type: "varchar",
        length: 20,
        nullable: true
    })
    share_type!: ShareType | null;

    @Column({
        type: "varchar",
        length: 4,
        nullable: true
    })
    share_code!: string | null;

    @Column({
        type: "timestamptz",
        nullable: true
    })
    share_expired_at!: Date | null;

    @CreateDateColumn({ name: "created_at", type: "timestamptz" })
    created_at!: Date;

    @UpdateDateColumn({ name: "updated_at", type: "timestamptz" })
    updated_at!: Date;
}
