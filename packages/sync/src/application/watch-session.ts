import { noopLogger, type StructuredLogger } from '@stackwatch/core/logging';
import { serialiseError } from '@stackwatch/core/reporting';

import { isTriggerResolutionError } from '../domain/errors.js';
import type {
  FileChangeEvent,
  PathObserverPort,
  WatchRegistration,
  WatchTarget,
} from '../domain/ports/watchers.js';
import { walkStacks, type Stack } from '../domain/stacks.js';
import { listResourceIdentifiers, loadStacks } from '../providers/index.js';
import type { ResourceTrigger, TriggerDependencies } from '../triggers/resource-trigger.js';
import { TemplateTrigger } from '../triggers/template-trigger.js';
import { createCodeTrigger } from '../triggers/trigger-factory.js';

export type WatchChange =
  | { readonly reason: 'template'; readonly templatePath: string; readonly event?: FileChangeEvent }
  | { readonly reason: 'code'; readonly resourceId: string; readonly event?: FileChangeEvent };

export interface WatchSessionOptions {
  /** Root template of the application. */
  readonly templatePath: string;
  readonly observer: PathObserverPort;
  /** Called once for every change that passed its trigger's gate. */
  readonly onChange: (change: WatchChange) => void;
  readonly logger?: StructuredLogger;
  readonly loadStacksImpl?: (templatePath: string) => Promise<Stack[]>;
  readonly dependencies?: TriggerDependencies;
}

export interface WatchSessionHandle {
  readonly stacks: readonly Stack[];
  /** Resources that currently have a code trigger registered. */
  readonly watchedResources: readonly string[];
  /** Reloads the stacks and replaces every registration. Failures leave the current ones active. */
  reload(): Promise<void>;
  close(): Promise<void>;
}

interface SessionState {
  readonly stacks: readonly Stack[];
  readonly watchedResources: readonly string[];
  readonly registration: WatchRegistration;
}

const LOGGER_NAME = 'stackwatch.sync';

/**
 * Watches every template of an application and the code of its resources, reporting
 * meaningful changes through `onChange`. A validated template change reloads the stacks and
 * rebuilds all triggers before it is reported.
 *
 * @param options - Template, observer, change listener and collaborator overrides.
 * @returns A handle exposing the current stacks and a way to stop watching.
 * @throws {StackLoadError} When the initial template cannot be loaded.
 */
export async function startWatchSession(options: WatchSessionOptions): Promise<WatchSessionHandle> {
  const logger = options.logger ?? noopLogger;
  const loadStacksImpl = options.loadStacksImpl ?? ((templatePath) => loadStacks(templatePath));
  const dependencies = options.dependencies ?? {};
  let closed = false;
  let queue: Promise<void> = Promise.resolve();

  const notify = (change: WatchChange): void => {
    logger.log({
      level: 'info',
      name: LOGGER_NAME,
      event: 'watch.change.detected',
      data: {
        reason: change.reason,
        ...(change.reason === 'code' ? { resourceId: change.resourceId } : {}),
        ...(change.event ? { path: change.event.path, type: change.event.type } : {}),
      },
    });
    options.onChange(change);
  };

  const register = (stacks: readonly Stack[]): SessionState => {
    const triggers: ResourceTrigger[] = [];
    const watchedResources: string[] = [];
    const templates = new Set<string>();

    for (const stack of walkStacks(stacks)) {
      if (templates.has(stack.location)) {
        continue;
      }
      templates.add(stack.location);
      const templatePath = stack.location;
      triggers.push(
        new TemplateTrigger(
          templatePath,
          (event) => {
            schedule(templatePath, event);
          },
          dependencies.createValidator ? { createValidator: dependencies.createValidator } : {},
        ),
      );
    }

    for (const identifier of listResourceIdentifiers(stacks)) {
      const resourceId = identifier.toString();
      try {
        const trigger = createCodeTrigger(
          identifier,
          stacks,
          (event) => {
            notify({ reason: 'code', resourceId, ...(event ? { event } : {}) });
          },
          dependencies,
        );
        if (trigger) {
          triggers.push(trigger);
          watchedResources.push(resourceId);
        }
      } catch (error) {
        if (!isTriggerResolutionError(error)) {
          throw error;
        }
        logger.log({
          level: 'warn',
          name: LOGGER_NAME,
          event: 'watch.trigger.skipped',
          data: { resourceId, reason: error.name, message: error.message },
        });
      }
    }

    const targets: WatchTarget[] = triggers.flatMap((trigger) => [...trigger.resolve()]);
    return { stacks, watchedResources, registration: options.observer.register(targets) };
  };

  const reload = async (templatePath: string, event?: FileChangeEvent): Promise<void> => {
    let stacks: Stack[];
    try {
      stacks = await loadStacksImpl(options.templatePath);
    } catch (error) {
      logger.log({
        level: 'warn',
        name: LOGGER_NAME,
        event: 'watch.template.reload-failed',
        data: { templatePath, error: serialiseError(error) },
      });
      return;
    }
    if (closed) {
      return;
    }

    const previous = state;
    state = register(stacks);
    await previous.registration.close();
    logger.log({
      level: 'info',
      name: LOGGER_NAME,
      event: 'watch.template.reloaded',
      data: { templatePath, resourceCount: state.watchedResources.length },
    });
    notify({ reason: 'template', templatePath, ...(event ? { event } : {}) });
  };

  const enqueue = (task: () => Promise<void>): Promise<void> => {
    queue = queue
      .then(async () => {
        if (!closed) {
          await task();
        }
      })
      .catch((error: unknown) => {
        logger.log({
          level: 'error',
          name: LOGGER_NAME,
          event: 'watch.template.reload-failed',
          data: { templatePath: options.templatePath, error: serialiseError(error) },
        });
      });
    return queue;
  };

  function schedule(templatePath: string, event?: FileChangeEvent): void {
    void enqueue(() => reload(templatePath, event));
  }

  let state = register(await loadStacksImpl(options.templatePath));
  logger.log({
    level: 'info',
    name: LOGGER_NAME,
    event: 'watch.started',
    data: { templatePath: options.templatePath, resourceCount: state.watchedResources.length },
  });

  return {
    get stacks() {
      return state.stacks;
    },
    get watchedResources() {
      return state.watchedResources;
    },
    async reload() {
      await enqueue(() => reload(options.templatePath));
    },
    async close() {
      if (closed) {
        return;
      }
      closed = true;
      await queue;
      await state.registration.close();
      await options.observer.close();
      logger.log({ level: 'info', name: LOGGER_NAME, event: 'watch.stopped' });
    },
  } satisfies WatchSessionHandle;
}
