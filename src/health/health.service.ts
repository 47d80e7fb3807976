import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';

export type ComponentHealth = {
  name: string;
  status: 'ok' | 'error';
  error?: string;
};

export type HealthReport = {
  status: 'ok' | 'error';
  services: { database: ComponentHealth };
};

function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === 'string' ? err : String(err);
}

@Injectable()
export class HealthService {
  constructor(private readonly dataSource: DataSource) {}

  async checkDatabase(): Promise<ComponentHealth> {
    try {
      await this.dataSource.query('SELECT 1');
      return { name: 'database', status: 'ok' };
    } catch (e: unknown) {
      return { name: 'database', status: 'error', error: describeError(e) };
    }
  }

  async check(): Promise<HealthReport> {
    const database = await this.checkDatabase();
    return { status: database.status, services: { database } };
  }
}
