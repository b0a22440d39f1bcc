import { SetMetadata } from '@nestjs/common';
import { COMMAND_HANDLER_METADATA } from '../interfaces';

/**
 * Marks a provider as the operation handler registered under `name`
 *
 * @param name - Operation-group name callers dispatch to
 * @returns Class decorator
 *
 * @example
 * ```typescript
 * @Injectable()
 * @CommandHandler('sceneManage')
 * export class SceneHandler extends BaseCommandHandler {
 *   readonly category = 'scene';
 *   readonly supportedOperations = ['inspect', 'rename'];
 *   ...
 * }
 * ```
 */
export function CommandHandler(name: string): ClassDecorator {
  return SetMetadata(COMMAND_HANDLER_METADATA, name);
}
