import type {
    DeepPartial,
    FindManyOptions,
    FindOneOptions,
    FindOptionsWhere,
    ObjectLiteral,
    Repository,
    UpdateResult
} from "typeorm";

export type PartialUpdate<T extends ObjectLiteral> = Parameters<Repository<T>["update"]>[1];

/**
 * Database Interfaces
 *
 * The slice of a TypeORM repository the services use. A real
 * `Repository<T>` satisfies it; tests pass plain mocks.
 */
export interface IRepository<T extends ObjectLiteral> {
    findOne(options: FindOneOptions<T>): Promise<T | null>;
    find(options?: FindManyOptions<T>): Promise<T[]>;
    create(data: DeepPartial<T>): T;
    save(entity: T): Promise<T>;
    remove(entity: T): Promise<T>;
    update(criteria: FindOptionsWhere<T>, changes: PartialUpdate<T>): Promise<UpdateResult>;
    increment(conditions: FindOptionsWhere<T>, propertyPath: string, value: number): Promise<unknown>;
}
