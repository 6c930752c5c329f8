import type { MaterialRepository } from '../repositories/types.js';
import type { Lesson, LessonView } from '../types/lessonTypes.js';

/**
 * Shapes lessons for a viewer. Without content access, non-preview lessons are
 * locked (no video, no materials) and preview lessons keep their video only.
 */
export const buildLessonViews = async (
  materials: MaterialRepository,
  lessons: Lesson[],
  canViewContent: boolean
): Promise<LessonView[]> => {
  const visibleIds = canViewContent ? lessons.map((lesson) => lesson.id) : [];
  const attached = await materials.listByLessons(visibleIds);

  return lessons.map((lesson) => {
    if (!canViewContent && !lesson.isPreview) {
      return { ...lesson, videoUrl: null, materials: [], isLocked: true };
    }
    return {
      ...lesson,
      materials: attached.filter((material) => material.lessonId === lesson.id),
      isLocked: false,
    };
  });
};
