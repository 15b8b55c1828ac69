import type { UpdaterEvents } from '@main/services/updater/UpdaterEvents';
import { describeProgress } from '@main/services/updater/progress-messages';

/**
 * Terminal stand-in for the tray icon, banner and dialogs. Subscribes to the
 * notifier events and writes one line per event.
 */
export class ConsoleUpdateSurface {
  private readonly unsubscribers: Array<() => void> = [];

  constructor(
    private readonly events: UpdaterEvents,
    private readonly write: (line: string) => void
  ) {}

  attach(): void {
    this.detach();
    this.unsubscribers.push(
      this.events.on('progress', (event) => {
        const line = describeProgress(event);
        const percent = line.fraction === null ? '...' : `${Math.round(line.fraction * 100)}%`;
        this.write(`[progresso] ${line.message} ${percent}`);
      }),
      this.events.on('icon', ({ visible }) => {
        this.write(visible ? '[ícone] visível' : '[ícone] oculto');
      }),
      this.events.on('notification', ({ message, count }) => {
        this.write(`[aviso] ${message.replace(/\n/g, ' - ')} (${count})`);
      }),
      this.events.on('outcome', (outcome) => {
        if (outcome.kind === 'up-to-date') {
          this.write('[resultado] sistema atualizado');
        } else if (outcome.kind === 'pending') {
          this.write(`[resultado] ${outcome.ids.length} atualização(ões) pendente(s)`);
        }
      }),
      this.events.on('install-result', (result) => {
        if (result.ok) {
          this.write(`[instalação] concluída (${result.installed.length})`);
        }
      }),
      this.events.on('error', ({ message }) => {
        this.write(`[erro] ${message}`);
      })
    );
  }

  detach(): void {
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }
  }
}
