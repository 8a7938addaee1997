/**
 * Courses Command
 *
 * Lists the indexed courses.
 *
 *   course-rag courses
 *   course-rag ls --json
 */

import { Command } from 'commander';
import chalk from 'chalk';

import { formatTable } from '../../utils/index.js';
import { defaultServices, type CommandServices } from '../runtime.js';
import type { CommandContext } from '../types.js';

/** One row of `course-rag courses --json` */
export interface CourseListEntry {
  title: string;
  instructor?: string;
  lessons: number;
  link?: string;
}

export function createCoursesCommand(
  getContext: () => CommandContext,
  services: CommandServices = defaultServices
): Command {
  return new Command('courses')
    .alias('ls')
    .description('List indexed courses')
    .action(() => {
      const ctx = getContext();
      const index = services.openIndex(services.loadConfig(), ctx);

      const courses: CourseListEntry[] = index.getCourseTitles().map((title) => {
        const course = index.getCourse(title);
        return {
          title,
          instructor: course?.instructor,
          lessons: course?.lessons.length ?? 0,
          link: course?.courseLink,
        };
      });

      if (ctx.options.json) {
        ctx.json({ totalCourses: courses.length, courses });
        return;
      }

      if (courses.length === 0) {
        ctx.log('No courses indexed yet.');
        ctx.log('');
        ctx.log(`Run ${chalk.cyan('course-rag ingest <folder>')} to add course documents.`);
        return;
      }

      ctx.log(chalk.bold(`Courses (${courses.length}):`));
      ctx.log(
        formatTable(
          [
            { header: '#', key: 'position', align: 'right' },
            { header: 'Title', key: 'title' },
            { header: 'Instructor', key: 'instructor' },
            { header: 'Lessons', key: 'lessons', align: 'right' },
          ],
          courses.map((course, i) => ({ position: i + 1, ...course }))
        )
      );
    });
}
