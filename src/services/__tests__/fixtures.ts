import { vi, type Mock } from 'vitest';
import type {
  BackendRequest,
  BackendResponse,
  GenerationBackend,
  StopReason,
} from '../../providers/types.js';
import type { Embedder } from '../embeddings.js';
import type { CourseOutline, CourseStore, SearchResultSet } from '../retrieval/types.js';

export function sampleSearchResults(): SearchResultSet {
  return {
    documents: [
      'MCP stands for Model Context Protocol. It allows AI models to interact with external tools.',
      'The MCP architecture uses a client-server pattern for tool communication.',
    ],
    metadata: [
      { course_title: 'Introduction to MCP', lesson_number: 1, chunk_index: 0 },
      { course_title: 'Introduction to MCP', lesson_number: 2, chunk_index: 3 },
    ],
    distances: [0.25, 0.42],
  };
}

export function sampleOutline(): CourseOutline {
  return {
    title: 'Introduction to MCP',
    courseLink: 'https://example.com/mcp',
    instructor: 'Test Instructor',
    lessons: [
      { lessonNumber: 0, title: 'Introduction', lessonLink: 'https://example.com/lesson/0' },
      { lessonNumber: 1, title: 'Getting Started', lessonLink: 'https://example.com/lesson/1' },
    ],
  };
}

export type MockCourseStore = { [K in keyof CourseStore]: Mock<CourseStore[K]> };

export function createMockStore(): MockCourseStore {
  return {
    search: vi.fn<CourseStore['search']>().mockResolvedValue(sampleSearchResults()),
    resolveCourseName: vi.fn<CourseStore['resolveCourseName']>().mockResolvedValue('Introduction to MCP'),
    getLessonLink: vi
      .fn<CourseStore['getLessonLink']>()
      .mockImplementation(async (_courseTitle, lessonNumber) => `https://example.com/lesson/${lessonNumber}`),
    getCourseOutline: vi.fn<CourseStore['getCourseOutline']>().mockResolvedValue(sampleOutline()),
    getExistingCourseTitles: vi
      .fn<CourseStore['getExistingCourseTitles']>()
      .mockResolvedValue(['Introduction to MCP']),
    getCourseCount: vi.fn<CourseStore['getCourseCount']>().mockResolvedValue(1),
  };
}

export function textResponse(text: string, stopReason: StopReason = 'end_turn'): BackendResponse {
  return {
    stop_reason: stopReason,
    content: [{ type: 'text', text }],
  };
}

export function toolUseResponse(
  name: string,
  input: Record<string, unknown>,
  id = 'tool_123'
): BackendResponse {
  return {
    stop_reason: 'tool_use',
    content: [{ type: 'tool_use', id, name, input }],
  };
}

/**
 * Replays queued responses (or throws queued errors) and records every request.
 */
export class ScriptedBackend implements GenerationBackend {
  name = 'scripted';
  requests: BackendRequest[] = [];
  private queue: Array<BackendResponse | Error>;

  constructor(responses: Array<BackendResponse | Error>) {
    this.queue = [...responses];
  }

  async createMessage(request: BackendRequest): Promise<BackendResponse> {
    this.requests.push(request);
    const next = this.queue.shift();
    if (next === undefined) {
      throw new Error('ScriptedBackend has no response left');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

/**
 * Bag-of-words embedder over a fixed vocabulary, so similarity is easy to reason about.
 */
export class KeywordEmbedder implements Embedder {
  constructor(private vocabulary: string[]) {}

  async embedText(text: string): Promise<number[]> {
    const tokens = text.toLowerCase().split(/[^a-z]+/).filter(Boolean);
    return this.vocabulary.map(word => tokens.filter(token => token === word).length);
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    return Promise.all(texts.map(text => this.embedText(text)));
  }
}
