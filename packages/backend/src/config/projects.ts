import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ValidationError } from '../utils/errors';
import { parseTime, durationToSlots } from '../utils/slot-time';

const timeString = z.string().refine((value) => parseTime(value) !== null, {
  message: 'Expected HH:MM',
});

const projectSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    specialists: z.array(z.string().min(1)).min(1),
    // service name -> duration in minutes
    services: z.record(z.string(), z.number().int().positive()).default({}),
    workHours: z
      .object({
        start: timeString.default('09:00'),
        end: timeString.default('18:00'),
      })
      .default({}),
    slotMinutes: z.number().int().positive().default(30),
    // Spreadsheet holding this project's mirror; falls back to GOOGLE_SHEET_ID
    googleSheetId: z.string().optional(),
    replies: z
      .object({
        slotTaken: z.string().default('Sorry, that time has just been taken. Please choose another slot.'),
        invalidRequest: z.string().default('Sorry, I could not process that booking. Please check the date and time.'),
      })
      .default({}),
  })
  .refine(
    (project) => (parseTime(project.workHours.start) ?? 0) < (parseTime(project.workHours.end) ?? 0),
    { message: 'workHours.start must be before workHours.end', path: ['workHours'] }
  );

const catalogueSchema = z.object({
  projects: z.array(projectSchema).min(1),
});

export type ProjectConfig = z.infer<typeof projectSchema>;
export type ProjectCatalogueInput = z.input<typeof catalogueSchema>;

/**
 * Per-project booking settings: specialists, services, business hours and slot size.
 */
export class ProjectCatalogue {
  private readonly projects: Map<string, ProjectConfig>;

  constructor(input: ProjectCatalogueInput) {
    const parsed = catalogueSchema.parse(input);
    this.projects = new Map(parsed.projects.map((project) => [project.id, project]));
  }

  static fromFile(filePath: string): ProjectCatalogue {
    const resolved = path.resolve(process.cwd(), filePath);
    const raw: unknown = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
    return new ProjectCatalogue(catalogueSchema.parse(raw));
  }

  get(projectId: string): ProjectConfig {
    const project = this.projects.get(projectId);
    if (!project) {
      throw new ValidationError(`Unknown project: ${projectId}`, { projectId });
    }
    return project;
  }

  has(projectId: string): boolean {
    return this.projects.has(projectId);
  }

  list(): ProjectConfig[] {
    return [...this.projects.values()];
  }

  /**
   * Resolve a specialist name case-insensitively to its configured spelling
   */
  resolveSpecialist(project: ProjectConfig, specialist: string): string {
    const wanted = specialist.trim().toLowerCase();
    const match = project.specialists.find((name) => name.toLowerCase() === wanted);
    if (!match) {
      throw new ValidationError(`Unknown specialist: ${specialist}`, {
        projectId: project.id,
        specialist,
      });
    }
    return match;
  }

  /**
   * Service duration rounded up to whole slots. Unknown services take one slot.
   */
  durationSlotsFor(project: ProjectConfig, serviceName: string | null | undefined): number {
    if (!serviceName) return 1;

    const wanted = serviceName.trim().toLowerCase();
    const entry = Object.entries(project.services).find(([name]) => name.toLowerCase() === wanted);
    return entry ? durationToSlots(entry[1], project.slotMinutes) : 1;
  }
}
