import { Telegraf } from 'telegraf';
import { ChatTarget } from '../bot/types';
import { DownloadService } from '../bot/services/DownloadService';
import { HistoryStore } from '../database/HistoryStore';
import { YtDlpEngine } from '../download/engine/YtDlpEngine';
import { DownloadQueue } from '../queue/DownloadQueue';
import { FileManager } from '../utils/FileManager';
import { AppConfig } from './config';

export interface AppContext {
  config: AppConfig;
  bot: Telegraf;
  queue: DownloadQueue<ChatTarget>;
  history: HistoryStore;
  engine: YtDlpEngine;
  fileManager: FileManager;
  downloadService: DownloadService;
}
