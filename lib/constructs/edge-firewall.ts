import * as wafv2 from 'aws-cdk-lib/aws-wafv2';
import { Construct } from 'constructs';

export interface EdgeFirewallProps {
  /** Base name for the web ACL and IP set. */
  name: string;
  /** CIDRs allowed through; when non-empty everything else is blocked. */
  ipAllowList: readonly string[];
  /** Requests per five minutes per client IP. */
  rateLimit?: number;
}

function visibility(metricName: string): wafv2.CfnWebACL.VisibilityConfigProperty {
  return {
    sampledRequestsEnabled: true,
    cloudWatchMetricsEnabled: true,
    metricName,
  };
}

/**
 * CloudFront-scoped web ACL: the AWS common rule set, per-IP rate limiting
 * and an optional allow-list that flips the default action to block.
 */
export class EdgeFirewall extends Construct {
  public readonly webAcl: wafv2.CfnWebACL;
  public readonly ipSet?: wafv2.CfnIPSet;

  constructor(scope: Construct, id: string, props: EdgeFirewallProps) {
    super(scope, id);

    const rules: wafv2.CfnWebACL.RuleProperty[] = [
      {
        name: 'AWSManagedRulesCommonRuleSet',
        priority: 10,
        overrideAction: { none: {} },
        statement: {
          managedRuleGroupStatement: {
            vendorName: 'AWS',
            name: 'AWSManagedRulesCommonRuleSet',
          },
        },
        visibilityConfig: visibility('CommonRuleSet'),
      },
      {
        name: 'RateLimitRule',
        priority: 20,
        action: { block: {} },
        statement: {
          rateBasedStatement: {
            limit: props.rateLimit ?? 2000,
            aggregateKeyType: 'IP',
          },
        },
        visibilityConfig: visibility('RateLimitRule'),
      },
    ];

    const allowListed = props.ipAllowList.length > 0;
    if (allowListed) {
      this.ipSet = new wafv2.CfnIPSet(this, 'IpAllowList', {
        name: `${props.name}-ip-whitelist`,
        scope: 'CLOUDFRONT',
        ipAddressVersion: 'IPV4',
        addresses: [...props.ipAllowList],
      });

      rules.push({
        name: 'IPWhitelistRule',
        priority: 1,
        action: { allow: {} },
        statement: {
          ipSetReferenceStatement: { arn: this.ipSet.attrArn },
        },
        visibilityConfig: visibility('IPWhitelistRule'),
      });
    }

    this.webAcl = new wafv2.CfnWebACL(this, 'WebAcl', {
      name: props.name,
      scope: 'CLOUDFRONT',
      defaultAction: allowListed ? { block: {} } : { allow: {} },
      rules,
      visibilityConfig: visibility(props.name),
    });
  }
}
