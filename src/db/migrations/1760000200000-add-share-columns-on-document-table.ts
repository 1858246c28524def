import { MigrationInterface, QueryRunner } from "typeorm";

export class AddShareColumnsOnDocumentTable1760000200000 implements MigrationInterface {
    name = 'AddShareColumnsOnDocumentTable1760000200000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`ALTER TABLE "documents" ADD "is_shared" boolean NOT NULL DEFAULT false`);
        await queryRunner.query(`ALTER TABLE "documents" ADD "share_uuid" character varying(36)`);
        await queryRunner.query(`ALTER TABLE "documents" ADD "share_type" character varying(20)`);
        await queryRunner.query(`ALTER TABLE "documents" ADD "share_code" character varying(4)`);
        await queryRunner.query(`ALTER TABLE "documents" ADD "share_expired_at" TIMESTAMP WITH TIME ZONE`);
        await queryRunner.query(`ALTER TABLE "documents" ADD CONSTRAINT "UQ_documents_share_uuid" UNIQUE ("share_uuid")`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`ALTER TABLE "documents" DROP CONSTRAINT "UQ_documents_share_uuid"`);
        await queryRunner.query(`ALTER TABLE "documents" DROP COLUMN "share_expired_at"`);
        await queryRunner.query(`ALTER TABLE "documents" DROP COLUMN "share_code"`);
        await queryRunner.query(`ALTER TABLE "documents" DROP COLUMN "share_type"`);
        await queryRunner.query(`ALTER TABLE "documents" DROP COLUMN "share_uuid"`);
        await queryRunner.query(`ALTER TABLE "documents" DROP COLUMN "is_shared"`);
    }

}
