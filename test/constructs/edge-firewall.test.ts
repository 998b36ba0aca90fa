import * as cdk from 'aws-cdk-lib';
import { Match, Template } from 'aws-cdk-lib/assertions';
import { EdgeFirewall, EdgeFirewallProps } from '../../lib/constructs/edge-firewall.js';
import { TEST_ENV } from '../helpers.js';

function synthFirewall(props: EdgeFirewallProps): { firewall: EdgeFirewall; template: Template } {
  const stack = new cdk.Stack(new cdk.App(), 'FirewallStack', { env: TEST_ENV });
  const firewall = new EdgeFirewall(stack, 'Firewall', props);
  return { firewall, template: Template.fromStack(stack) };
}

describe('EdgeFirewall', () => {
  test('allows by default without an allow-list', () => {
    const { firewall, template } = synthFirewall({ name: 'edge', ipAllowList: [] });

    expect(firewall.ipSet).toBeUndefined();
    template.resourceCountIs('AWS::WAFv2::IPSet', 0);
    template.hasResourceProperties('AWS::WAFv2::WebACL', {
      Name: 'edge',
      Scope: 'CLOUDFRONT',
      DefaultAction: { Allow: {} },
      Rules: [
        Match.objectLike({
          Name: 'AWSManagedRulesCommonRuleSet',
          Priority: 10,
          OverrideAction: { None: {} },
          Statement: {
            ManagedRuleGroupStatement: { VendorName: 'AWS', Name: 'AWSManagedRulesCommonRuleSet' },
          },
        }),
        Match.objectLike({
          Name: 'RateLimitRule',
          Priority: 20,
          Action: { Block: {} },
          Statement: { RateBasedStatement: { Limit: 2000, AggregateKeyType: 'IP' } },
        }),
      ],
    });
  });

  test('honours a custom rate limit', () => {
    const { template } = synthFirewall({ name: 'edge', ipAllowList: [], rateLimit: 500 });

    template.hasResourceProperties('AWS::WAFv2::WebACL', {
      Rules: Match.arrayWith([
        Match.objectLike({
          Statement: { RateBasedStatement: { Limit: 500, AggregateKeyType: 'IP' } },
        }),
      ]),
    });
  });

  test('an allow-list admits listed ranges and blocks the rest', () => {
    const { firewall, template } = synthFirewall({
      name: 'edge',
      ipAllowList: ['198.51.100.0/24', '203.0.113.10/32'],
    });

    expect(firewall.ipSet).toBeDefined();
    template.hasResourceProperties('AWS::WAFv2::IPSet', {
      Name: 'edge-ip-whitelist',
      IPAddressVersion: 'IPV4',
      Addresses: ['198.51.100.0/24', '203.0.113.10/32'],
    });
    template.hasResourceProperties('AWS::WAFv2::WebACL', {
      DefaultAction: { Block: {} },
      Rules: Match.arrayWith([
        Match.objectLike({
          Name: 'IPWhitelistRule',
          Priority: 1,
          Action: { Allow: {} },
          Statement: { IPSetReferenceStatement: { Arn: { 'Fn::GetAtt': [Match.anyValue(), 'Arn'] } } },
        }),
      ]),
    });
  });
});
