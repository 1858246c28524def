import { config } from "dotenv";
import { DataSource } from "typeorm";
import { User } from "./entities/user.entity";
import { Document } from "./entities/document.entity";
import { CreateUserTable1760000000000 } from "./migrations/1760000000000-create-user-table";
import { CreateDocumentTable1760000100000 } from "./migrations/1760000100000-create-document-table";
import { AddShareColumnsOnDocumentTable1760000200000 } from "./migrations/1760000200000-add-share-columns-on-document-table";

config();

export const AppDataSource = new DataSource({
    type: "postgres",
    url: process.env.DATABASE_URL,
    synchronize: false,
    logging: process.env.NODE_ENV === 'development',
    entities: [User, Document],
    migrations: [
        CreateUserTable1760000000000,
        CreateDocumentTable1760000100000,
        AddShareColumnsOnDocumentTable1760000200000
    ],
});
