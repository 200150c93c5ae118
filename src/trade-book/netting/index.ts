import { NettingPolicyName } from '../../config/app-config';
import { NettingPolicy } from './netting-policy.interface';
import { SameActionNettingPolicy } from './same-action-netting.policy';
import { OpposingActionNettingPolicy } from './opposing-action-netting.policy';

export { NETTING_POLICY, NettingPolicy, BookKeyFields } from './netting-policy.interface';
export { SameActionNettingPolicy } from './same-action-netting.policy';
export { OpposingActionNettingPolicy } from './opposing-action-netting.policy';

export function createNettingPolicy(name: NettingPolicyName): NettingPolicy {
  switch (name) {
    case 'opposing-action':
      return new OpposingActionNettingPolicy();
    case 'same-action':
      return new SameActionNettingPolicy();
  }
}
