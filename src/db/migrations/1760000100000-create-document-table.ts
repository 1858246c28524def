import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateDocumentTable1760000100000 implements MigrationInterface {
    name = 'CreateDocumentTable1760000100000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "documents" ("id" SERIAL NOT NULL, "filename" character varying(255) NOT NULL, "file_md5" character varying(32) NOT NULL, "file_size" bigint NOT NULL, "mime_type" character varying(255) NOT NULL DEFAULT 'application/octet-stream', "minio_path" character varying(500) NOT NULL, "file_uuid" character varying(36) NOT NULL, "uploader_id" integer NOT NULL, "is_public" boolean NOT NULL DEFAULT false, "download_count" integer NOT NULL DEFAULT 0, "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), "updated_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "UQ_documents_file_uuid" UNIQUE ("file_uuid"), CONSTRAINT "PK_documents_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE INDEX "IDX_documents_uploader_id" ON "documents" ("uploader_id")`);
        await queryRunner.query(`ALTER TABLE "documents" ADD CONSTRAINT "FK_documents_uploader_id" FOREIGN KEY ("uploader_id") REFERENCES "users"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`ALTER TABLE "documents" DROP CONSTRAINT "FK_documents_uploader_id"`);
        await queryRunner.query(`DROP INDEX "IDX_documents_uploader_id"`);
        await queryRunner.query(`DROP TABLE "documents"`);
    }

}
