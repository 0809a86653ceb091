import type {
  InstructorProfilePatch,
  InstructorRecord,
  InstructorRepositoryPort,
  NewInstructor,
} from '../../services/ports/instructor.repository.port';
import type { DbPort } from '../../services/ports/db.port';
import { qaTable } from '../db/fqn.utils';

const INSTRUCTOR_TABLE = qaTable('instructors');

const INSTRUCTOR_COLUMNS = `
  id, username, email, display_name, password_hash, role, is_active, created_at, last_login
`;

export class DbInstructorRepository implements InstructorRepositoryPort {
  constructor(private readonly db: DbPort) {}

  async insertInstructor(data: NewInstructor): Promise<InstructorRecord> {
    return this.db.insert<InstructorRecord>(
      INSTRUCTOR_TABLE,
      {
        username: data.username,
        email: data.email,
        display_name: data.display_name,
        password_hash: data.password_hash,
        role: data.role,
      },
      { operation: 'insertInstructor' }
    );
  }

  async getById(id: number): Promise<InstructorRecord | null> {
    const sql = `SELECT ${INSTRUCTOR_COLUMNS} FROM ${INSTRUCTOR_TABLE} WHERE id = ?`;
    return this.db.queryOne<InstructorRecord>(sql, [id], { operation: 'getInstructorById' });
  }

  async getByLogin(login: string): Promise<InstructorRecord | null> {
    const sql = `
      SELECT ${INSTRUCTOR_COLUMNS}
      FROM ${INSTRUCTOR_TABLE}
      WHERE username = ? OR LOWER(email) = LOWER(?)
      ORDER BY (username = ?) DESC
      LIMIT 1
    `;
    return this.db.queryOne<InstructorRecord>(sql, [login, login, login], { operation: 'getInstructorByLogin' });
  }

  async updateProfile(id: number, patch: InstructorProfilePatch): Promise<InstructorRecord | null> {
    const fields: Record<string, unknown> = {};
    if (patch.display_name !== undefined) fields.display_name = patch.display_name;
    if (patch.email !== undefined) fields.email = patch.email;
    if (patch.password_hash !== undefined) fields.password_hash = patch.password_hash;
    await this.db.update(INSTRUCTOR_TABLE, id, fields, 'id', { operation: 'updateInstructorProfile' });
    return this.getById(id);
  }

  async touchLastLogin(id: number, at: Date): Promise<void> {
    await this.db.update(INSTRUCTOR_TABLE, id, { last_login: at }, 'id', { operation: 'touchInstructorLogin' });
  }

  async setActive(id: number, isActive: boolean): Promise<InstructorRecord | null> {
    const sql = `
      UPDATE ${INSTRUCTOR_TABLE}
      SET is_active = ?
      WHERE id = ?
      RETURNING ${INSTRUCTOR_COLUMNS}
    `;
    return this.db.queryOne<InstructorRecord>(sql, [isActive, id], { operation: 'setInstructorActive' });
  }

  async listAll(): Promise<InstructorRecord[]> {
    const sql = `SELECT ${INSTRUCTOR_COLUMNS} FROM ${INSTRUCTOR_TABLE} ORDER BY created_at ASC, id ASC`;
    return this.db.query<InstructorRecord>(sql, [], { operation: 'listInstructors' });
  }

  async count(): Promise<number> {
    const row = await this.db.queryOne<{ count: number }>(
      `SELECT COUNT(*)::int AS count FROM ${INSTRUCTOR_TABLE}`,
      [],
      { operation: 'countInstructors' }
    );
    return row?.count ?? 0;
  }
}

export function createDbInstructorRepository(db: DbPort): InstructorRepositoryPort {
  return new DbInstructorRepository(db);
}
