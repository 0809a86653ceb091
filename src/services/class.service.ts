import type { ClassListItem, ClassRecord, ClassRepositoryPort } from './ports/class.repository.port';
import type { MeetingAccessService } from './meeting-access.service';
import type { AuthContext } from '../types/auth.types';
import { toIso } from '../utils/question-views';
import { NotFoundError } from '../utils/errors';

export interface ClassView {
  id: number;
  instructor_id: number;
  name: string;
  description: string | null;
  is_archived: boolean;
  created_at: string;
  updated_at: string;
  meeting_count?: number;
  active_meeting_count?: number;
}

function toClassView(record: ClassRecord | ClassListItem): ClassView {
  return {
    id: record.id,
    instructor_id: record.instructor_id,
    name: record.name,
    description: record.description,
    is_archived: record.is_archived,
    created_at: toIso(record.created_at),
    updated_at: toIso(record.updated_at),
    ...('meeting_count' in record
      ? { meeting_count: record.meeting_count, active_meeting_count: record.active_meeting_count }
      : {}),
  };
}

export class ClassService {
  constructor(
    private readonly classes: ClassRepositoryPort,
    private readonly access: MeetingAccessService
  ) {}

  async createClass(auth: AuthContext, input: { name: string; description?: string | null }): Promise<ClassView> {
    const record = await this.classes.insertClass({
      instructor_id: auth.instructorId,
      name: input.name,
      description: input.description ?? null,
    });
    return toClassView(record);
  }

  async listClasses(auth: AuthContext, includeArchived = false): Promise<ClassView[]> {
    const rows = await this.classes.listForInstructor(auth.instructorId, includeArchived);
    return rows.map(toClassView);
  }

  async getClass(classId: number, auth: AuthContext): Promise<ClassView> {
    return toClassView(await this.access.getOwnedClass(classId, auth));
  }

  async updateClass(
    classId: number,
    auth: AuthContext,
    input: { name?: string; description?: string | null }
  ): Promise<ClassView> {
    await this.access.getOwnedClass(classId, auth);
    const updated = await this.classes.updateFields(classId, input);
    if (!updated) throw new NotFoundError('Class not found');
    return toClassView(updated);
  }

  async archiveClass(classId: number, auth: AuthContext): Promise<ClassView> {
    await this.access.getOwnedClass(classId, auth);
    const archived = await this.classes.archive(classId);
    if (!archived) throw new NotFoundError('Class not found');
    return toClassView(archived);
  }
}
