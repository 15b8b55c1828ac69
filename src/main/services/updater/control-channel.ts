import type { LogSink } from '@main/services/logging/Logger';
import type { UpdateNotifier } from '@main/services/updater/UpdateNotifier';

export type ControlCommand =
  | { name: 'check' }
  | { name: 'install' }
  | { name: 'show' }
  | { name: 'interval'; hours: number };

export function parseControlMessage(line: string): ControlCommand | null {
  const [head = '', ...rest] = line.trim().split(/\s+/);
  switch (head.toLowerCase()) {
    case 'check':
      return { name: 'check' };
    case 'install':
      return { name: 'install' };
    case 'show':
      return { name: 'show' };
    case 'interval': {
      const raw = rest[0] ?? '';
      if (!/^\d+$/.test(raw)) {
        return null;
      }
      return { name: 'interval', hours: Number(raw) };
    }
    default:
      return null;
  }
}

type ControlTarget = Pick<UpdateNotifier, 'checkNow' | 'requestInstall' | 'listPendingUpdates' | 'setCheckInterval'>;

interface ControlContext {
  logger: LogSink;
  print: (text: string) => void;
}

/** Returns false for messages this updater does not understand. */
export function handleControlMessage(target: ControlTarget, line: string, context: ControlContext): boolean {
  const command = parseControlMessage(line);
  if (!command) {
    return false;
  }

  context.logger.debug('updater.control.received', { command: command.name });

  switch (command.name) {
    case 'check':
      void target.checkNow().catch((error: unknown) => logCommandError(context.logger, command.name, error));
      return true;
    case 'install':
      void target.requestInstall().catch((error: unknown) => logCommandError(context.logger, command.name, error));
      return true;
    case 'show': {
      const rows = target.listPendingUpdates();
      if (rows.length === 0) {
        context.print('Nenhuma atualização pendente.');
        return true;
      }
      for (const row of rows) {
        context.print(`${row.name}\t${row.version}`);
      }
      return true;
    }
    case 'interval': {
      const config = target.setCheckInterval(command.hours);
      context.print(
        config.interval === 0
          ? 'Verificação periódica desativada.'
          : `Verificando atualizações a cada ${config.interval} h.`
      );
      return true;
    }
  }
}

function logCommandError(logger: LogSink, command: ControlCommand['name'], error: unknown): void {
  logger.error('updater.control.command_failed', {
    command,
    reason: error instanceof Error ? error.message : String(error)
  });
}
