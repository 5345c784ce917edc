/**
 * Database container generator
 */

import { databaseHostname, type DatabaseConfig } from '@berth/config';
import { Labels, databaseCompatibility, forDatabase } from '../../labels';
import { LOOPBACK, type DatabaseResources } from './types';

export const DATABASE_IMAGE = 'docker.io/library/{engine}:{version}';

export const DATABASE_USER = 'berth';
export const DATABASE_PASSWORD = 'berth';
export const DATABASE_NAME = 'berth';

interface EngineSettings {
  dataDir: string;
  containerPort: number;
  env: string[];
}

const MYSQL_SETTINGS: EngineSettings = {
  dataDir: '/var/lib/mysql',
  containerPort: 3306,
  env: [
    `MYSQL_ROOT_PASSWORD=${DATABASE_PASSWORD}`,
    `MYSQL_DATABASE=${DATABASE_NAME}`,
    `MYSQL_USER=${DATABASE_USER}`,
    `MYSQL_PASSWORD=${DATABASE_PASSWORD}`,
  ],
};

const POSTGRES_SETTINGS: EngineSettings = {
  dataDir: '/var/lib/postgresql/data',
  containerPort: 5432,
  env: [
    `POSTGRES_USER=${DATABASE_USER}`,
    `POSTGRES_DB=${DATABASE_NAME}`,
    `POSTGRES_PASSWORD=${DATABASE_PASSWORD}`,
  ],
};

export function databaseImage(db: DatabaseConfig): string {
  return DATABASE_IMAGE.replace('{engine}', db.engine).replace('{version}', db.version);
}

/**
 * Generate the volume and container for a database. The container port is
 * the engine default; the declared port is the one published on loopback.
 */
export function generateDatabase(environment: string, db: DatabaseConfig): DatabaseResources {
  const hostname = databaseHostname(db);
  const settings = db.engine === 'postgres' ? POSTGRES_SETTINGS : MYSQL_SETTINGS;

  const labels = forDatabase(environment, db)
    .with(Labels.managed, 'true')
    .with(Labels.databasePort, db.port)
    .with(Labels.databaseCompatibility, databaseCompatibility(db.engine))
    .toLabels();

  return {
    hostname,
    volume: { name: hostname, labels },
    container: {
      name: hostname,
      image: databaseImage(db),
      labels,
      env: [...settings.env],
      ports: [
        {
          containerPort: settings.containerPort,
          hostPort: Number(db.port),
          protocol: 'tcp',
          hostIp: LOOPBACK,
        },
      ],
      mounts: [{ type: 'volume', source: hostname, target: settings.dataDir }],
      extraHosts: [],
      networkAliases: [hostname],
    },
  };
}
