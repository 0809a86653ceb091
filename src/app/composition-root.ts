import type { AppConfig } from '../config/app.config';
import { loadConfig } from '../config/app.config';
import type { DbPort } from '../services/ports/db.port';
import { createPostgresDbAdapter } from '../adapters/db/postgres.adapter';
import type { InstructorRepositoryPort } from '../services/ports/instructor.repository.port';
import type { ApiKeyRepositoryPort } from '../services/ports/api-key.repository.port';
import type { ClassRepositoryPort } from '../services/ports/class.repository.port';
import type { MeetingRepositoryPort } from '../services/ports/meeting.repository.port';
import type { QuestionRepositoryPort } from '../services/ports/question.repository.port';
import type { VoteRepositoryPort } from '../services/ports/vote.repository.port';
import type { AnswerRepositoryPort } from '../services/ports/answer.repository.port';
import type { AuditLogRepositoryPort } from '../services/ports/audit-log.repository.port';
import type { ProfanityClassifierPort } from '../services/ports/profanity-classifier.port';
import { createDbInstructorRepository } from '../adapters/repositories/db-instructor.repository';
import { createDbApiKeyRepository } from '../adapters/repositories/db-api-key.repository';
import { createDbClassRepository } from '../adapters/repositories/db-class.repository';
import { createDbMeetingRepository } from '../adapters/repositories/db-meeting.repository';
import { createDbQuestionRepository } from '../adapters/repositories/db-question.repository';
import { createDbVoteRepository } from '../adapters/repositories/db-vote.repository';
import { createDbAnswerRepository } from '../adapters/repositories/db-answer.repository';
import { createDbAuditLogRepository } from '../adapters/repositories/db-audit-log.repository';
import { createWordListProfanityAdapter } from '../adapters/moderation/word-list-profanity.adapter';
import { SessionBroadcastHub } from '../services/session-broadcast-hub.service';
import { MeetingBroadcaster } from '../services/meeting-broadcaster.service';
import { AuditLogService } from '../services/audit-log.service';
import { ApiKeyService } from '../services/api-key.service';
import { AuthService } from '../services/auth.service';
import { InstructorService } from '../services/instructor.service';
import { ClassService } from '../services/class.service';
import { MeetingAccessService } from '../services/meeting-access.service';
import { MeetingLifecycleService } from '../services/meeting-lifecycle.service';
import { ModerationService } from '../services/moderation.service';
import { VoteAggregatorService } from '../services/vote-aggregator.service';
import { QuestionService } from '../services/question.service';
import { AnswerService } from '../services/answer.service';
import { ReportService } from '../services/report.service';
import type { MeetingEvent } from '../types/meeting.types';
import { createTokenService, type TokenService } from '../utils/jwt.utils';
import { logger } from '../utils/logger';

export interface RepositorySet {
  instructors: InstructorRepositoryPort;
  apiKeys: ApiKeyRepositoryPort;
  classes: ClassRepositoryPort;
  meetings: MeetingRepositoryPort;
  questions: QuestionRepositoryPort;
  votes: VoteRepositoryPort;
  answers: AnswerRepositoryPort;
  auditLog: AuditLogRepositoryPort;
}

export function createDbRepositories(db: DbPort): RepositorySet {
  return {
    instructors: createDbInstructorRepository(db),
    apiKeys: createDbApiKeyRepository(db),
    classes: createDbClassRepository(db),
    meetings: createDbMeetingRepository(db),
    questions: createDbQuestionRepository(db),
    votes: createDbVoteRepository(db),
    answers: createDbAnswerRepository(db),
    auditLog: createDbAuditLogRepository(db),
  };
}

export interface CompositionOverrides {
  repositories?: Partial<RepositorySet>;
  profanityClassifier?: ProfanityClassifierPort;
}

/**
 * Wires repositories, the broadcast hub and every service from one AppConfig.
 * The hub is created once per root; every publisher and subscriber shares it.
 */
export class CompositionRoot {
  private readonly _repositories: RepositorySet;
  private readonly _tokenService: TokenService;
  private readonly _broadcastHub: SessionBroadcastHub<MeetingEvent>;
  private readonly _broadcaster: MeetingBroadcaster;
  private readonly _auditLogService: AuditLogService;
  private readonly _apiKeyService: ApiKeyService;
  private readonly _authService: AuthService;
  private readonly _instructorService: InstructorService;
  private readonly _meetingAccessService: MeetingAccessService;
  private readonly _classService: ClassService;
  private readonly _meetingLifecycleService: MeetingLifecycleService;
  private readonly _moderationService: ModerationService;
  private readonly _voteAggregatorService: VoteAggregatorService;
  private readonly _questionService: QuestionService;
  private readonly _answerService: AnswerService;
  private readonly _reportService: ReportService;

  constructor(
    private readonly config: AppConfig,
    private readonly dbPort: DbPort,
    overrides: CompositionOverrides = {}
  ) {
    this._repositories = { ...createDbRepositories(dbPort), ...overrides.repositories };
    const repos = this._repositories;

    this._tokenService = createTokenService({
      secret: config.auth.jwtSecret,
      accessTokenTtlSeconds: config.auth.accessTokenTtlSeconds,
      meetingTokenTtlSeconds: config.auth.meetingTokenTtlSeconds,
    });
    this._broadcastHub = new SessionBroadcastHub<MeetingEvent>({ sendTimeoutMs: config.broadcast.sendTimeoutMs });
    this._broadcaster = new MeetingBroadcaster(this._broadcastHub);

    this._auditLogService = new AuditLogService(repos.auditLog);
    this._apiKeyService = new ApiKeyService(repos.apiKeys, this._auditLogService);
    this._authService = new AuthService(repos.instructors, this._apiKeyService, this._tokenService);
    this._instructorService = new InstructorService(
      repos.instructors,
      this._apiKeyService,
      this._tokenService,
      this._auditLogService,
      {
        registrationEnabled: config.auth.registrationEnabled,
        passwordHashRounds: config.auth.passwordHashRounds,
      }
    );
    this._meetingAccessService = new MeetingAccessService(repos.meetings, repos.questions, repos.classes, this._tokenService);
    this._classService = new ClassService(repos.classes, this._meetingAccessService);
    this._meetingLifecycleService = new MeetingLifecycleService(
      repos.meetings,
      this._meetingAccessService,
      this._broadcaster,
      this._auditLogService,
      { baseUrl: config.baseUrl, passwordHashRounds: config.auth.passwordHashRounds }
    );
    this._moderationService = new ModerationService(
      overrides.profanityClassifier ?? createWordListProfanityAdapter(),
      {
        profanityFilterEnabled: config.moderation.profanityFilterEnabled,
        requireApproval: config.moderation.requireApproval,
      },
      repos.questions,
      this._meetingAccessService,
      this._broadcaster,
      this._auditLogService
    );
    this._voteAggregatorService = new VoteAggregatorService(
      repos.votes,
      repos.questions,
      this._meetingAccessService,
      this._broadcaster,
      this._auditLogService
    );
    this._questionService = new QuestionService(
      repos.questions,
      this._moderationService,
      this._meetingAccessService,
      this._broadcaster,
      this._voteAggregatorService,
      this._meetingLifecycleService
    );
    this._answerService = new AnswerService(repos.answers, this._meetingAccessService, this._broadcaster);
    this._reportService = new ReportService(repos.questions, this._meetingAccessService);
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getDbPort(): DbPort {
    return this.dbPort;
  }

  getRepositories(): RepositorySet {
    return this._repositories;
  }

  getTokenService(): TokenService {
    return this._tokenService;
  }

  getBroadcastHub(): SessionBroadcastHub<MeetingEvent> {
    return this._broadcastHub;
  }

  getMeetingBroadcaster(): MeetingBroadcaster {
    return this._broadcaster;
  }

  getAuditLogService(): AuditLogService {
    return this._auditLogService;
  }

  getApiKeyService(): ApiKeyService {
    return this._apiKeyService;
  }

  getAuthService(): AuthService {
    return this._authService;
  }

  getInstructorService(): InstructorService {
    return this._instructorService;
  }

  getMeetingAccessService(): MeetingAccessService {
    return this._meetingAccessService;
  }

  getClassService(): ClassService {
    return this._classService;
  }

  getMeetingLifecycleService(): MeetingLifecycleService {
    return this._meetingLifecycleService;
  }

  getModerationService(): ModerationService {
    return this._moderationService;
  }

  getVoteAggregatorService(): VoteAggregatorService {
    return this._voteAggregatorService;
  }

  getQuestionService(): QuestionService {
    return this._questionService;
  }

  getAnswerService(): AnswerService {
    return this._answerService;
  }

  getReportService(): ReportService {
    return this._reportService;
  }
}

let composition: CompositionRoot | null = null;

export function getCompositionRoot(): CompositionRoot {
  if (!composition) {
    const config = loadConfig();
    composition = new CompositionRoot(config, createPostgresDbAdapter(config.database));
    logger.info('composition-root:initialized', { env: config.env });
  }
  return composition;
}

/** Replaces the process-wide root; tests install one built on in-memory repositories. */
export function setCompositionRoot(root: CompositionRoot | null): void {
  composition = root;
}
