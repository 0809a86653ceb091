export interface ClassRecord {
  id: number;
  instructor_id: number;
  name: string;
  description: string | null;
  is_archived: boolean;
  created_at: Date;
  updated_at: Date;
}

export interface ClassListItem extends ClassRecord {
  meeting_count: number;
  active_meeting_count: number;
}

export interface ClassRepositoryPort {
  insertClass(data: { instructor_id: number; name: string; description: string | null }): Promise<ClassRecord>;
  getById(classId: number): Promise<ClassRecord | null>;
  listForInstructor(instructorId: number, includeArchived: boolean): Promise<ClassListItem[]>;
  updateFields(classId: number, fields: { name?: string; description?: string | null }): Promise<ClassRecord | null>;
  archive(classId: number): Promise<ClassRecord | null>;
}
