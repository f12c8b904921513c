import type { AppConfig } from '../config';
import { CardService } from './cardService';
import { openDatabase, type Db } from './database';
import { FocusService } from './focusService';
import { GamifyService } from './gamifyService';
import { JobScheduler } from './jobScheduler';
import { ManifestationService } from './manifestationService';
import { ReflectionLog } from './reflectionService';
import type { MessageSender } from '../types';

export interface AppServices {
  config: AppConfig;
  db: Db;
  scheduler: JobScheduler;
  reflections: ReflectionLog;
  manifestations: ManifestationService;
  cards: CardService;
  gamify: GamifyService;
  focus: FocusService;
}

export function createServices(config: AppConfig, sender: MessageSender, db: Db = openDatabase(config.dbPath)): AppServices {
  const scheduler = new JobScheduler(config.timezone);
  const reflections = new ReflectionLog(db);
  const gamify = new GamifyService(db, config.timezone);
  return {
    config,
    db,
    scheduler,
    reflections,
    manifestations: new ManifestationService({ sender, reflections, config }),
    cards: new CardService({ sender, reflections, config }),
    gamify,
    focus: new FocusService({ db, gamify, scheduler, sender, timezone: config.timezone }),
  };
}
