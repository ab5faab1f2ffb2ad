import type { DeepPartial, EntityTarget, FindManyOptions, FindOneOptions, FindOptionsWhere, ObjectLiteral } from "typeorm";
import type { QueryDeepPartialEntity } from "typeorm/query-builder/QueryPartialEntity";

/**
 * Database Interfaces
 *
 * The slice of TypeORM the store depends on, so tests can substitute
 * in-memory repositories.
 */

export interface IRepository<T extends ObjectLiteral> {
    findOne(options: FindOneOptions<T>): Promise<T | null>;
    find(options?: FindManyOptions<T>): Promise<T[]>;
    save(entity: DeepPartial<T>): Promise<T>;
    update(criteria: FindOptionsWhere<T>, partial: QueryDeepPartialEntity<T>): Promise<unknown>;
}

export interface IEntityManager {
    save<T extends ObjectLiteral>(target: EntityTarget<T>, entities: DeepPartial<T>[]): Promise<T[]>;
}

export interface IDataSource {
    getRepository<T extends ObjectLiteral>(target: EntityTarget<T>): IRepository<T>;
    transaction<R>(work: (manager: IEntityManager) => Promise<R>): Promise<R>;
}
