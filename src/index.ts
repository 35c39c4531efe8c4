import http from 'http';
import { config } from './config/env.config';
import { createApp } from './app';
import { CaptureLog } from './services/captureLog.service';
import { CaptureOrchestrator } from './services/captureOrchestrator.service';
import { ChunkedTransferService } from './services/chunkTransfer.service';
import { PhotoStorageService } from './services/photoStorage.service';
import { CaptureEventsService } from './services/socket.service';
import { CommandCaptureDevice } from './services/devices/command.device';
import { PlaceholderCaptureDevice } from './services/devices/placeholder.device';
import { NativeCaptureDevice } from './services/devices/types';
import { errorMessage } from './utils/errors';

const log = new CaptureLog({
  initialLine: '---------------------------------- shutterlink started ----------------------------------',
  filePath: config.logFilePath,
});

// Anything that slips past a handler still ends up in the log
process.on('uncaughtException', (error) => {
  log.addLine('UNCAUGHT EXCEPTION:');
  log.addLine(error.stack ?? error.message);
});
process.on('unhandledRejection', (reason) => {
  log.addLine(`UNHANDLED REJECTION: ${reason instanceof Error ? reason.stack ?? reason.message : String(reason)}`);
});

const createDevice = (): NativeCaptureDevice => {
  if (!config.captureCommand) {
    return new PlaceholderCaptureDevice(config.placeholderImagePath, log);
  }
  return new CommandCaptureDevice(
    {
      captureCommand: config.captureCommand,
      foregroundCommands: config.foregroundCommands,
      placeholderImagePath: config.placeholderImagePath,
      commandTimeoutMs: config.captureCommandTimeoutMs,
    },
    log
  );
};

const startServer = async () => {
  log.addLine(
    `Config loaded: port=${config.port}, photo_folder_path=${config.photoFolderPath}, ` +
      `capture_timeout_seconds=${config.captureTimeoutSeconds}, preview_last_photo=${config.previewLastPhoto}`
  );

  const storage = new PhotoStorageService(
    {
      photoFolderPath: config.photoFolderPath,
      placeholderImagePath: config.placeholderImagePath,
      filePrefix: config.photoFilePrefix,
    },
    log
  );
  storage.ensureBaseDirectoryExists();
  try {
    await storage.ensurePlaceholderImage();
  } catch (error) {
    log.addLine(`❌ Could not create placeholder image: ${errorMessage(error)}`);
  }

  const device = createDevice();
  log.addLine(`📷 Capture device: ${device.name}`);

  const orchestrator = new CaptureOrchestrator(device, storage, log, {
    defaultTimeoutSeconds: config.captureTimeoutSeconds,
    pollIntervalMs: config.pollIntervalMs,
  });
  const transfer = new ChunkedTransferService(storage, log);

  const events = new CaptureEventsService(log, config.previewLastPhoto);

  const app = createApp({
    log,
    orchestrator,
    transfer,
    storage,
    captureTimeoutSeconds: config.captureTimeoutSeconds,
    notifier: events,
  });
  const httpServer = http.createServer(app);
  events.attach(httpServer);

  httpServer.on('error', (error) => {
    log.addLine(`HTTP API failed/stopped: ${error.message}`);
    process.exit(1);
  });

  httpServer.listen(config.port, () => {
    log.addLine(`🚀 HTTP API started on port ${config.port}`);
  });
};

startServer().catch((error) => {
  log.addLine(`Failed to start server: ${errorMessage(error)}`);
  process.exit(1);
});
