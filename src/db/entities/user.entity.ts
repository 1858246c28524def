import { Column, Entity, PrimaryGeneratedColumn, CreateDateColumn, UpdateDateColumn, OneToMany } from "typeorm";
import type { Document } from "./document.entity";

/**
 * User Entity
 *
 * Accounts that log in with email + password and own uploaded documents.
 *
 * Roles:
 * - is_admin: may upload (when uploads are admin-only), manage users,
 *   and read or delete any document
 * - is_active: inactive users can neither log in nor use issued tokens
 *
 * Emails are stored lower-cased; the unique constraint relies on that.
 */
@Entity({ name: "users" })
export class User {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({
        type: "varchar",
        length: 255,
        unique: true
    })
    email!: string;

    @Column({
        type: "varchar",
        length: 255
    })
    hashed_password!: string; // bcrypt hash

    @Column({
        type: "varchar",
        length: 100,
        nullable: true
    })
    full_name!: string | null;

    @Column({
        type: "boolean",
        default: true
    })
    is_active!: boolean;

    @Column({
        type: "boolean",
        default: false
    })
    is_admin!: boolean;

    @OneToMany("Document", "uploader")
    documents?: Document[];

    @CreateDateColumn({ name: "created_at", type: "timestamptz" })
    created_at!: Date;

    @UpdateDateColumn({ name: "updated_at", type: "timestamptz" })
    updated_at!: Date;
}
