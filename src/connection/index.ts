// Connection module exports

export { TypeOrmConnection, type OwnedDataSource, type OwnedQueryRunner } from "./typeorm-connection";
export { TypeOrmConnectionFactory, toDataSourceOptions } from "./typeorm-connection-factory";
export { withConnection } from "./scoped";
