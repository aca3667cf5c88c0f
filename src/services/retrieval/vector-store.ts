/**
 * Course Vector Store
 * In-memory catalog and chunk index ranked by cosine distance
 */

import { cosineSimilarity, type Embedder } from '../embeddings.js';
import { logger as rootLogger, type Logger } from '../../logger.js';
import { getErrorMessage } from '../../utils/errors.js';
import { createSearchResults, emptySearchResults } from './search-results.js';
import type {
  Course,
  CourseChunk,
  CourseOutline,
  CourseStore,
  SearchParams,
  SearchResultSet,
} from './types.js';

interface CatalogEntry {
  course: Course;
  embedding: number[];
}

interface IndexedChunk {
  chunk: CourseChunk;
  embedding: number[];
}

export interface CourseVectorStoreOptions {
  maxResults?: number;
  logger?: Logger;
}

function normalizeTitle(title: string): string {
  return title.trim().toLowerCase();
}

export class CourseVectorStore implements CourseStore {
  private catalog: Map<string, CatalogEntry> = new Map();
  private chunks: IndexedChunk[] = [];
  private maxResults: number;
  private log: Logger;

  constructor(private embedder: Embedder, options: CourseVectorStoreOptions = {}) {
    this.maxResults = options.maxResults ?? 5;
    this.log = (options.logger ?? rootLogger).child({ component: 'vector-store' });
  }

  async addCourseMetadata(course: Course): Promise<void> {
    const embedding = await this.embedder.embedText(course.title);
    this.catalog.set(normalizeTitle(course.title), { course, embedding });
    this.log.debug({ course: course.title, lessons: course.lessons.length }, 'Course metadata indexed');
  }

  async addCourseContent(chunks: CourseChunk[]): Promise<void> {
    if (chunks.length === 0) return;

    const embeddings = await this.embedder.embedTexts(chunks.map((c) => c.content));
    chunks.forEach((chunk, i) => {
      this.chunks.push({ chunk, embedding: embeddings[i] });
    });
    this.log.debug({ count: chunks.length }, 'Course content indexed');
  }

  clearAllData(): void {
    this.catalog.clear();
    this.chunks = [];
  }

  /**
   * Semantic search over course content.
   * An unresolvable course filter and embedder failures come back as `error`, never as a throw.
   */
  async search(params: SearchParams): Promise<SearchResultSet> {
    try {
      let courseTitle: string | null = null;
      if (params.courseName) {
        courseTitle = await this.resolveCourseName(params.courseName);
        if (!courseTitle) {
          return emptySearchResults(`No course found matching '${params.courseName}'`);
        }
      }

      const wantedTitle = courseTitle === null ? null : normalizeTitle(courseTitle);
      const candidates = this.chunks.filter(({ chunk }) => {
        if (wantedTitle !== null && normalizeTitle(chunk.courseTitle) !== wantedTitle) return false;
        if (params.lessonNumber !== undefined && chunk.lessonNumber !== params.lessonNumber) return false;
        return true;
      });

      if (candidates.length === 0) {
        return emptySearchResults();
      }

      const queryEmbedding = await this.embedder.embedText(params.query);
      const ranked = candidates
        .map((entry) => ({
          chunk: entry.chunk,
          distance: 1 - cosineSimilarity(queryEmbedding, entry.embedding),
        }))
        .sort((a, b) => a.distance - b.distance)
        .slice(0, params.limit ?? this.maxResults);

      return createSearchResults(
        ranked.map((r) => r.chunk.content),
        ranked.map((r) => ({
          course_title: r.chunk.courseTitle,
          lesson_number: r.chunk.lessonNumber ?? null,
          chunk_index: r.chunk.chunkIndex,
        })),
        ranked.map((r) => r.distance)
      );
    } catch (error) {
      this.log.warn({ err: error }, 'Course search failed');
      return emptySearchResults(`Search error: ${getErrorMessage(error)}`);
    }
  }

  /**
   * Maps a partial or approximate course name to a stored title.
   * Exact (case-insensitive) matches win; otherwise the nearest title by embedding.
   */
  async resolveCourseName(courseName: string): Promise<string | null> {
    if (this.catalog.size === 0) return null;

    const exact = this.catalog.get(normalizeTitle(courseName));
    if (exact) return exact.course.title;

    const queryEmbedding = await this.embedder.embedText(courseName);
    let best: { title: string; similarity: number } | null = null;
    for (const entry of this.catalog.values()) {
      const similarity = cosineSimilarity(queryEmbedding, entry.embedding);
      if (!best || similarity > best.similarity) {
        best = { title: entry.course.title, similarity };
      }
    }

    return best ? best.title : null;
  }

  async getCourseLink(courseTitle: string): Promise<string | null> {
    return this.catalog.get(normalizeTitle(courseTitle))?.course.courseLink ?? null;
  }

  async getLessonLink(courseTitle: string, lessonNumber: number): Promise<string | null> {
    const entry = this.catalog.get(normalizeTitle(courseTitle));
    if (!entry) return null;

    const lesson = entry.course.lessons.find((l) => l.lessonNumber === lessonNumber);
    return lesson?.lessonLink ?? null;
  }

  async getCourseOutline(courseTitle: string): Promise<CourseOutline | null> {
    const entry = this.catalog.get(normalizeTitle(courseTitle));
    if (!entry) return null;

    const { course } = entry;
    return {
      title: course.title,
      courseLink: course.courseLink ?? null,
      instructor: course.instructor ?? null,
      lessons: course.lessons.map((lesson) => ({
        lessonNumber: lesson.lessonNumber,
        title: lesson.title,
        lessonLink: lesson.lessonLink ?? null,
      })),
    };
  }

  async getExistingCourseTitles(): Promise<string[]> {
    return Array.from(this.catalog.values()).map((entry) => entry.course.title);
  }

  async getCourseCount(): Promise<number> {
    return this.catalog.size;
  }
}
