import type { AddressValidator } from '../address-validation/address-validator.types';
import type { DateConverter } from '../date-conversion/date-converter.types';
import type { FlowContext, NodeConfig } from '../flow/flow.types';
import type { FlowManager } from '../flow/flow-manager';
import type { NotificationSender } from '../notification/notification.types';
import type { IntakeState } from '../shared/intake-state.interface';

export type IntakeServices = {
  addressValidator: AddressValidator;
  dateConverter: DateConverter;
  notifier: NotificationSender;
};

export type ClosingDetails = {
  appointment?: string;
  confirmationSent?: boolean;
};

/** Builders for every node of the intake graph. Handlers reach the next node through these. */
export interface IntakeNodes {
  initial(): IntakeNodeConfig;
  dateOfBirth(): IntakeNodeConfig;
  insurance(): IntakeNodeConfig;
  referral(): IntakeNodeConfig;
  chiefComplaint(): IntakeNodeConfig;
  address(): IntakeNodeConfig;
  addressRetry(errorReason: string): IntakeNodeConfig;
  contactInfo(): IntakeNodeConfig;
  appointmentScheduling(): IntakeNodeConfig;
  end(closing?: ClosingDetails): IntakeNodeConfig;
}

export type IntakeDeps = {
  services: IntakeServices;
  nodes: IntakeNodes;
};

export type IntakeFlowContext = FlowContext<IntakeState, IntakeDeps>;

export type IntakeNodeConfig = NodeConfig<IntakeFlowContext>;

export type IntakeFlowManager = FlowManager<IntakeState, IntakeDeps>;
