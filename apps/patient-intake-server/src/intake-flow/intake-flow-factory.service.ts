import { Inject, Injectable } from '@nestjs/common';
import { ADDRESS_VALIDATOR, AddressValidator } from '../address-validation/address-validator.types';
import { DateConverterService } from '../date-conversion/date-converter.service';
import { FlowManager } from '../flow/flow-manager';
import { NOTIFICATION_SENDER, NotificationSender } from '../notification/notification.types';
import type { IntakeState } from '../shared/intake-state.interface';
import { IntakeDeps, IntakeFlowManager, IntakeNodeConfig } from './intake-flow.types';
import { intakeNodes } from './intake-nodes';

export type IntakeFlowOptions = {
  onConversationEnd?: (state: Readonly<Partial<IntakeState>>) => void | Promise<void>;
};

/** Builds one flow manager per call, each with its own state and the shared collaborators. */
@Injectable()
export class IntakeFlowFactoryService {
  constructor(
    @Inject(ADDRESS_VALIDATOR) private readonly addressValidator: AddressValidator,
    private readonly dateConverter: DateConverterService,
    @Inject(NOTIFICATION_SENDER) private readonly notifier: NotificationSender,
  ) {}

  create(sessionId: string, options: IntakeFlowOptions = {}): IntakeFlowManager {
    const deps: IntakeDeps = {
      services: {
        addressValidator: this.addressValidator,
        dateConverter: this.dateConverter,
        notifier: this.notifier,
      },
      nodes: intakeNodes,
    };
    return new FlowManager<IntakeState, IntakeDeps>({
      sessionId,
      deps,
      onConversationEnd: options.onConversationEnd,
    });
  }

  entryNode(): IntakeNodeConfig {
    return intakeNodes.initial();
  }
}
