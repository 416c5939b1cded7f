import { loadAccentTable } from '../core/accent/table.js';
import { selectMimeDetector } from '../core/input/mime.js';
import { AssemblyAiAnalyzer, createAssemblyAiClient } from '../services/analysis/assemblyai.js';
import { MediaAcquisitionService } from '../services/media/acquisition.js';
import { createToolServices } from '../services/tools/index.js';
import { Orchestrator } from './index.js';
import type { AppConfig } from '../core/config.js';
import type { Logger } from '../core/types.js';

export async function createOrchestrator(config: AppConfig, logger: Logger): Promise<Orchestrator> {
  const accentTable = loadAccentTable(config.accentTablePath);
  const tools = createToolServices(config.tools);
  const mimeDetector = await selectMimeDetector(tools.ffmpeg, logger);

  logger.info('Orchestrator initialized', {
    accents: accentTable.size,
    mimeDetector: mimeDetector.name,
    tools: { ffmpeg: config.tools.ffmpeg, ffprobe: config.tools.ffprobe, ytDlp: config.tools.ytDlp },
  });

  return new Orchestrator({
    acquisition: new MediaAcquisitionService(tools.ffmpeg, tools.ytdlp, logger),
    analyzer: new AssemblyAiAnalyzer(createAssemblyAiClient(config.assemblyAiApiKey), logger),
    mimeDetector,
    accentTable,
    logger,
    onStateChange: (requestId, state) => logger.debug('State change', { requestId, state }),
  });
}
