import type { CourseCatalog } from '../src/catalog.js';

export const CATALOG: CourseCatalog = {
  courses: [
    {
      title: 'Intro to Retrieval',
      instructor: 'Ada Lane',
      link: 'https://example.com/retrieval',
      lessons: [
        {
          lessonNumber: 1,
          title: 'Chunking',
          link: 'https://example.com/retrieval/lesson-1',
          content: 'Chunking splits documents into passages.\n\nParagraphs keep related sentences together.',
        },
        {
          lessonNumber: 2,
          title: 'Embeddings',
          link: 'https://example.com/retrieval/lesson-2',
          content: 'Embeddings map passages to vectors.\n\n  \n\nVectors near each other hold similar passages.',
        },
      ],
    },
    {
      title: 'Prompt Design Basics',
      lessons: [
        {
          lessonNumber: 1,
          title: 'Roles',
          content: 'System prompts set the role of the model.',
        },
      ],
    },
  ],
};
