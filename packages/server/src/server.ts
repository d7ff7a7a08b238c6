import Fastify, { type FastifyBaseLogger, type FastifyInstance } from "fastify";
import fastifyCors from "@fastify/cors";
import fastifyMultipart from "@fastify/multipart";
import fastifyStatic from "@fastify/static";
import { readFileSync } from "node:fs";
import { TokenService, createLogger, type HomeroomConfig, type Logger } from "@homeroom/core";
import { AssignmentManager } from "./assignments/assignment-manager.js";
import { AttachmentManager } from "./attachments/attachment-manager.js";
import { AuthService } from "./auth/auth-service.js";
import { TokenStore } from "./auth/token-store.js";
import { AttendanceManager } from "./calendar/attendance-manager.js";
import { EventManager } from "./calendar/event-manager.js";
import { EventTypeManager } from "./calendar/event-type-manager.js";
import { HomeroomDatabase } from "./db/database.js";
import { ExpenseCategoryManager } from "./expenses/category-manager.js";
import { ExpenseManager } from "./expenses/expense-manager.js";
import { registerAuthentication } from "./http/authenticate.js";
import { registerErrorHandlers } from "./http/errors.js";
import { RateLimiter, registerRateLimit } from "./http/rate-limit.js";
import { LessonPlanManager } from "./lesson-plans/lesson-plan-manager.js";
import { MailTemplates, OutboxMailer, type Mailer } from "./mail/mailer.js";
import { ReportCardManager } from "./report-cards/report-card-manager.js";
import { registerAssignmentRoutes } from "./routes/assignments.js";
import { registerAuthRoutes, registerPublicAuthRoutes } from "./routes/auth.js";
import { registerEventTypeRoutes } from "./routes/event-types.js";
import { registerEventRoutes } from "./routes/events.js";
import { registerExpenseCategoryRoutes } from "./routes/expense-categories.js";
import { registerExpenseRoutes } from "./routes/expenses.js";
import { registerHealthRoutes } from "./routes/health.js";
import { registerLessonPlanRoutes } from "./routes/lesson-plans.js";
import { registerReportCardRoutes } from "./routes/report-cards.js";
import { registerStudentRoutes } from "./routes/students.js";
import { registerSubjectRoutes } from "./routes/subjects.js";
import { registerTaskRoutes } from "./routes/tasks.js";
import { registerTeacherRoutes } from "./routes/teachers.js";
import { FileStore } from "./storage/file-store.js";
import { StudentManager } from "./students/student-manager.js";
import { SubjectManager } from "./subjects/subject-manager.js";
import { TaskManager } from "./tasks/task-manager.js";
import { TeacherManager } from "./teachers/teacher-manager.js";

export interface ServerOptions {
  config: HomeroomConfig;
  /** Defaults to a logger built from config.log */
  logger?: Logger;
  /** Defaults to the outbox mailer */
  mailer?: Mailer;
  /** Epoch milliseconds; drives token expiry and rate-limit windows */
  clock?: () => number;
}

// Augment Fastify types to include our custom decorators
declare module "fastify" {
  interface FastifyInstance {
    homeroomConfig: HomeroomConfig;
    database: HomeroomDatabase;
    fileStore: FileStore;
    mailer: Mailer;
    mailTemplates: MailTemplates;
    rateLimiter: RateLimiter;
    authService: AuthService;
    teacherManager: TeacherManager;
    studentManager: StudentManager;
    subjectManager: SubjectManager;
    eventTypeManager: EventTypeManager;
    eventManager: EventManager;
    attendanceManager: AttendanceManager;
    attachmentManager: AttachmentManager;
    assignmentManager: AssignmentManager;
    taskManager: TaskManager;
    reportCardManager: ReportCardManager;
    expenseCategoryManager: ExpenseCategoryManager;
    expenseManager: ExpenseManager;
    lessonPlanManager: LessonPlanManager;
  }
}

const RATE_LIMIT_SWEEP_MS = 60_000;

function packageVersion(): string {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  } catch {
    // Running from a build without package.json beside it
    return "unknown";
  }
  return typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string"
    ? raw.version
    : "unknown";
}

export async function createServer(options: ServerOptions): Promise<FastifyInstance> {
  const { config } = options;
  const clock = options.clock ?? Date.now;
  const log = options.logger ?? createLogger(config.log);
  const loggerInstance: FastifyBaseLogger = log;

  const fastify = Fastify({ loggerInstance });

  // ─── Persistence and services ───

  const database = new HomeroomDatabase(config.database.path);
  const db = database.getDb();
  const fileStore = new FileStore(config.uploads.dir);
  const mailer = options.mailer ?? new OutboxMailer(db, log);
  const mailTemplates = new MailTemplates(config.publicUrl);
  const tokens = new TokenService(config.auth, clock);
  const rateLimiter = new RateLimiter(config.rateLimits, clock);

  const teacherManager = new TeacherManager(db);
  const eventTypeManager = new EventTypeManager(db);
  const expenseCategoryManager = new ExpenseCategoryManager(db);
  const attachmentManager = new AttachmentManager(db);
  const eventManager = new EventManager(db);

  const seedDefaults = db.transaction((teacherId: string) => {
    eventTypeManager.createDefaults(teacherId);
    expenseCategoryManager.createDefaults(teacherId);
  });

  const authService = new AuthService({
    teachers: teacherManager,
    tokens,
    store: new TokenStore(db, clock),
    mailer,
    templates: mailTemplates,
    config: config.auth,
    log,
    seedDefaults: (teacherId) => seedDefaults(teacherId),
  });

  fastify.decorate("homeroomConfig", config);
  fastify.decorate("database", database);
  fastify.decorate("fileStore", fileStore);
  fastify.decorate("mailer", mailer);
  fastify.decorate("mailTemplates", mailTemplates);
  fastify.decorate("rateLimiter", rateLimiter);
  fastify.decorate("authService", authService);
  fastify.decorate("teacherManager", teacherManager);
  fastify.decorate("studentManager", new StudentManager(db));
  fastify.decorate("subjectManager", new SubjectManager(db));
  fastify.decorate("eventTypeManager", eventTypeManager);
  fastify.decorate("eventManager", eventManager);
  fastify.decorate("attendanceManager", new AttendanceManager(db, eventManager));
  fastify.decorate("attachmentManager", attachmentManager);
  fastify.decorate("assignmentManager", new AssignmentManager(db, attachmentManager));
  fastify.decorate("taskManager", new TaskManager(db));
  fastify.decorate("reportCardManager", new ReportCardManager(db));
  fastify.decorate("expenseCategoryManager", expenseCategoryManager);
  fastify.decorate("expenseManager", new ExpenseManager(db));
  fastify.decorate("lessonPlanManager", new LessonPlanManager(db, attachmentManager));
  fastify.decorateRequest("teacherId", "");

  // ─── Plugins ───

  await fastify.register(fastifyCors, {
    origin: config.server.corsOrigin,
  });

  // Size and type limits are applied per upload kind when the file is read
  await fastify.register(fastifyMultipart, {
    limits: { files: 1, fields: 10 },
  });

  // Uploads are never served directly; routes call reply.sendFile after auth
  await fastify.register(fastifyStatic, {
    root: fileStore.root,
    serve: false,
    cacheControl: false,
  });

  registerErrorHandlers(fastify);

  // ─── API ───

  await fastify.register(
    async (api) => {
      registerRateLimit(api, rateLimiter);
      await registerHealthRoutes(api, { version: packageVersion(), startedAt: Date.now() });

      await api.register(async (open) => {
        await registerPublicAuthRoutes(open);
      });

      await api.register(async (secured) => {
        registerAuthentication(secured, {
          tokens,
          isActiveTeacher: (teacherId) => teacherManager.isActive(teacherId),
        });
        await registerAuthRoutes(secured);
        await registerTeacherRoutes(secured);
        await registerStudentRoutes(secured);
        await registerSubjectRoutes(secured);
        await registerEventTypeRoutes(secured);
        await registerEventRoutes(secured);
        await registerAssignmentRoutes(secured);
        await registerTaskRoutes(secured);
        await registerReportCardRoutes(secured);
        await registerExpenseCategoryRoutes(secured);
        await registerExpenseRoutes(secured);
        await registerLessonPlanRoutes(secured);
      });
    },
    { prefix: "/api/v1" },
  );

  // ─── Lifecycle ───

  const sweeper = setInterval(() => rateLimiter.sweep(), RATE_LIMIT_SWEEP_MS);
  sweeper.unref();

  fastify.addHook("onClose", async () => {
    clearInterval(sweeper);
    database.close();
  });

  return fastify;
}
