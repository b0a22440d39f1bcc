import { Inject, Injectable, Optional } from '@nestjs/common';
import {
  ASSET_RESOLVER,
  AssetResolver,
  CommandHandlerContext,
  LIVE_OBJECT_RESOLVER,
  LiveObjectResolver,
  PAYLOAD_VALIDATOR,
  PayloadValidator,
  SIDE_EFFECT_WAITER,
  SideEffectWaiter,
  TYPE_RESOLVER,
  TypeResolver,
} from '../interfaces';

/**
 * Injectable bundle of the collaborators handlers resolve through.
 * Handlers fall back to their own validator when none is bound.
 */
@Injectable()
export class HandlerContextService implements CommandHandlerContext {
  constructor(
    @Optional() @Inject(PAYLOAD_VALIDATOR) readonly validator?: PayloadValidator,
    @Optional() @Inject(LIVE_OBJECT_RESOLVER) readonly liveObjects?: LiveObjectResolver,
    @Optional() @Inject(ASSET_RESOLVER) readonly assets?: AssetResolver,
    @Optional() @Inject(TYPE_RESOLVER) readonly types?: TypeResolver,
    @Optional() @Inject(SIDE_EFFECT_WAITER) readonly sideEffectWaiter?: SideEffectWaiter,
  ) {}
}
