// Course catalog models and the retrieval backend contract

export interface Lesson {
  lessonNumber: number;
  title: string;
  lessonLink?: string | null;
}

export interface Course {
  title: string;
  courseLink?: string | null;
  instructor?: string | null;
  lessons: Lesson[];
}

export interface CourseChunk {
  content: string;
  courseTitle: string;
  lessonNumber?: number | null;
  chunkIndex: number;
}

export interface ChunkMetadata {
  course_title?: string;
  lesson_number?: number | null;
  chunk_index?: number;
}

export interface SearchParams {
  query: string;
  courseName?: string;
  lessonNumber?: number;
  limit?: number;
}

export interface SearchResultSet {
  documents: string[];
  metadata: ChunkMetadata[];
  distances: number[];
  error?: string;
}

export interface CourseOutline {
  title: string;
  courseLink: string | null;
  instructor: string | null;
  lessons: Array<{ lessonNumber: number; title: string; lessonLink: string | null }>;
}

/**
 * Retrieval backend consumed by the course tools.
 * Implementations own indexing and similarity search.
 */
export interface CourseStore {
  search(params: SearchParams): Promise<SearchResultSet>;
  resolveCourseName(courseName: string): Promise<string | null>;
  getLessonLink(courseTitle: string, lessonNumber: number): Promise<string | null>;
  getCourseOutline(courseTitle: string): Promise<CourseOutline | null>;
  getExistingCourseTitles(): Promise<string[]>;
  getCourseCount(): Promise<number>;
}
