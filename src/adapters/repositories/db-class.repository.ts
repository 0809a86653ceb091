import type { ClassListItem, ClassRecord, ClassRepositoryPort } from '../../services/ports/class.repository.port';
import type { DbPort } from '../../services/ports/db.port';
import { qaTable } from '../db/fqn.utils';

const CLASS_TABLE = qaTable('classes');
const MEETING_TABLE = qaTable('class_meetings');

const CLASS_COLUMNS = 'id, instructor_id, name, description, is_archived, created_at, updated_at';

export class DbClassRepository implements ClassRepositoryPort {
  constructor(private readonly db: DbPort) {}

  async insertClass(data: { instructor_id: number; name: string; description: string | null }): Promise<ClassRecord> {
    return this.db.insert<ClassRecord>(CLASS_TABLE, data, { operation: 'insertClass' });
  }

  async getById(classId: number): Promise<ClassRecord | null> {
    const sql = `SELECT ${CLASS_COLUMNS} FROM ${CLASS_TABLE} WHERE id = ?`;
    return this.db.queryOne<ClassRecord>(sql, [classId], { operation: 'getClassById' });
  }

  async listForInstructor(instructorId: number, includeArchived: boolean): Promise<ClassListItem[]> {
    const sql = `
      SELECT
        c.id, c.instructor_id, c.name, c.description, c.is_archived, c.created_at, c.updated_at,
        COUNT(m.id)::int AS meeting_count,
        COUNT(m.id) FILTER (WHERE m.is_active)::int AS active_meeting_count
      FROM ${CLASS_TABLE} c
      LEFT JOIN ${MEETING_TABLE} m ON m.class_id = c.id
      WHERE c.instructor_id = ?
        AND (? OR c.is_archived = FALSE)
      GROUP BY c.id
      ORDER BY c.created_at DESC, c.id DESC
    `;
    return this.db.query<ClassListItem>(sql, [instructorId, includeArchived], { operation: 'listClasses' });
  }

  async updateFields(
    classId: number,
    fields: { name?: string; description?: string | null }
  ): Promise<ClassRecord | null> {
    const patch: Record<string, unknown> = { updated_at: new Date() };
    if (fields.name !== undefined) patch.name = fields.name;
    if (fields.description !== undefined) patch.description = fields.description;
    const changed = await this.db.update(CLASS_TABLE, classId, patch, 'id', { operation: 'updateClass' });
    return changed > 0 ? this.getById(classId) : null;
  }

  async archive(classId: number): Promise<ClassRecord | null> {
    const sql = `
      UPDATE ${CLASS_TABLE}
      SET is_archived = TRUE, updated_at = ?
      WHERE id = ?
      RETURNING ${CLASS_COLUMNS}
    `;
    return this.db.queryOne<ClassRecord>(sql, [new Date(), classId], { operation: 'archiveClass' });
  }
}

export function createDbClassRepository(db: DbPort): ClassRepositoryPort {
  return new DbClassRepository(db);
}
