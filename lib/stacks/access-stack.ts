import * as cdk from 'aws-cdk-lib';
import * as apigatewayv2 from 'aws-cdk-lib/aws-apigatewayv2';
import * as integrations from 'aws-cdk-lib/aws-apigatewayv2-integrations';
import * as acm from 'aws-cdk-lib/aws-certificatemanager';
import * as cloudfront from 'aws-cdk-lib/aws-cloudfront';
import * as origins from 'aws-cdk-lib/aws-cloudfront-origins';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as route53 from 'aws-cdk-lib/aws-route53';
import * as targets from 'aws-cdk-lib/aws-route53-targets';
import { Construct } from 'constructs';
import { AccessSettings } from '../config/schema.js';
import { DeepReadonly } from '../config/environment.js';
import { EdgeFirewall } from '../constructs/edge-firewall.js';
import { ConfigurationError } from '../errors.js';
import { DeploymentStack, DeploymentStackProps } from './base-stack.js';
import { ComputeStackOutputs } from './compute-stack.js';
import { N8N_PORT, NetworkStackOutputs } from './network-stack.js';

export interface AccessStackProps extends DeploymentStackProps {
  network: NetworkStackOutputs;
  compute: ComputeStackOutputs;
}

export interface AccessStackOutputs {
  api: apigatewayv2.HttpApi;
  vpcLink: apigatewayv2.VpcLink;
  /** False when the service had no discovery handle to route to. */
  routed: boolean;
  distribution?: cloudfront.Distribution;
  firewall?: EdgeFirewall;
  /** Set only when the distribution serves the domain under a certificate. */
  customDomain?: string;
}

/** CloudFront-scope web ACLs are created in this region only. */
export const EDGE_FIREWALL_REGION = 'us-east-1';

const DEFAULT_ACCESS: DeepReadonly<Pick<AccessSettings, 'cloudfrontEnabled' | 'wafEnabled' | 'ipWhitelist' | 'corsOrigins'>> = {
  cloudfrontEnabled: false,
  wafEnabled: false,
  ipWhitelist: [],
  corsOrigins: ['*'],
};

/** Apex zone name for a domain: its last two labels. */
export function zoneNameFor(domainName: string): string {
  return domainName.split('.').slice(-2).join('.');
}

/**
 * Managed-gateway ingress: HTTP API over a VPC link to the service's Cloud
 * Map entry, optionally fronted by CloudFront and a web ACL.
 */
export class AccessStack extends DeploymentStack {
  public readonly outputs: Readonly<AccessStackOutputs>;

  constructor(scope: Construct, id: string, props: AccessStackProps) {
    super(scope, id, props);

    const { network, compute } = props;
    const access = this.config.settings.access ?? DEFAULT_ACCESS;
    const domainName = this.config.settings.access?.domainName;

    const firewallEnabled = access.cloudfrontEnabled && access.wafEnabled;
    if (firewallEnabled && this.config.region !== EDGE_FIREWALL_REGION) {
      throw new ConfigurationError(
        'access.wafEnabled',
        `region=${this.config.region}`,
        `CloudFront web ACLs can only be deployed in ${EDGE_FIREWALL_REGION}`,
      );
    }

    // ---------------------------------------------------------------
    // Gateway -> service ingress
    // ---------------------------------------------------------------
    // Standalone rule so the network stack's group is not modified here
    new ec2.CfnSecurityGroupIngress(this, 'GatewayIngress', {
      groupId: network.securityGroups.app.securityGroupId,
      ipProtocol: 'tcp',
      fromPort: N8N_PORT,
      toPort: N8N_PORT,
      cidrIp: network.vpc.vpcCidrBlock,
      description: 'Allow API Gateway to access n8n',
    });

    // ---------------------------------------------------------------
    // HTTP API
    // ---------------------------------------------------------------
    const vpcLink = new apigatewayv2.VpcLink(this, 'VpcLink', {
      vpcLinkName: this.resourceName('vpc-link'),
      vpc: network.vpc,
      subnets: { subnets: network.subnets },
      securityGroups: [network.securityGroups.app],
    });

    const api = new apigatewayv2.HttpApi(this, 'HttpApi', {
      apiName: this.resourceName('api'),
      description: `n8n API for ${this.config.name}`,
      corsPreflight: {
        allowOrigins: [...access.corsOrigins],
        allowMethods: [apigatewayv2.CorsHttpMethod.ANY],
        allowHeaders: ['*'],
        maxAge: cdk.Duration.days(1),
      },
    });

    const serviceDiscovery = compute.serviceDiscovery;
    if (serviceDiscovery) {
      const integration = new integrations.HttpServiceDiscoveryIntegration(
        'N8nIntegration',
        serviceDiscovery,
        { vpcLink },
      );
      api.addRoutes({ path: '/{proxy+}', methods: [apigatewayv2.HttpMethod.ANY], integration });
      api.addRoutes({ path: '/', methods: [apigatewayv2.HttpMethod.ANY], integration });
    } else {
      this.reportSoftDegrade('gateway route attachment', 'service discovery handle');
    }

    // ---------------------------------------------------------------
    // CloudFront + WAF
    // ---------------------------------------------------------------
    let distribution: cloudfront.Distribution | undefined;
    let firewall: EdgeFirewall | undefined;
    let customDomain: string | undefined;

    if (access.cloudfrontEnabled) {
      if (access.wafEnabled) {
        firewall = new EdgeFirewall(this, 'EdgeFirewall', {
          name: this.resourceName('waf'),
          ipAllowList: access.ipWhitelist,
        });
      }
      ({ distribution, customDomain } = this.createDistribution(api, domainName, firewall));
    }

    // ---------------------------------------------------------------
    // Custom domain
    // ---------------------------------------------------------------
    if (domainName) {
      this.createDomainRecord(domainName, distribution, customDomain);
    }

    // ---------------------------------------------------------------
    // Stack outputs
    // ---------------------------------------------------------------
    this.outputs = Object.freeze({
      api,
      vpcLink,
      routed: serviceDiscovery !== undefined,
      distribution,
      firewall,
      customDomain,
    });

    this.addOutput('ApiUrl', api.url ?? api.apiEndpoint, 'API Gateway URL');
    this.addOutput('ApiId', api.apiId, 'API Gateway ID');

    if (distribution) {
      this.addOutput(
        'DistributionUrl',
        `https://${distribution.distributionDomainName}`,
        'CloudFront distribution URL',
      );
      this.addOutput('DistributionId', distribution.distributionId, 'CloudFront distribution ID');
      if (customDomain) {
        this.addOutput('CustomDomainUrl', `https://${customDomain}`, 'Custom domain URL');
      }
    }
  }

  private createDistribution(
    api: apigatewayv2.HttpApi,
    domainName: string | undefined,
    firewall: EdgeFirewall | undefined,
  ): { distribution: cloudfront.Distribution; customDomain?: string } {
    let certificate: acm.ICertificate | undefined;
    const certificateArn = this.sharedResource('security', 'certificateArn');
    if (certificateArn) {
      certificate = acm.Certificate.fromCertificateArn(this, 'SharedCertificate', certificateArn);
    } else if (domainName) {
      this.reportSoftDegrade('custom domain on distribution', 'shared certificate');
    }

    const originRequestPolicy = new cloudfront.OriginRequestPolicy(this, 'OriginRequestPolicy', {
      originRequestPolicyName: this.resourceName('origin-policy'),
      headerBehavior: cloudfront.OriginRequestHeaderBehavior.allowList(
        'Accept',
        'Accept-Language',
        'Content-Type',
        'Origin',
        'Referer',
        'User-Agent',
        'CloudFront-Forwarded-Proto',
        'CloudFront-Viewer-Country',
      ),
      queryStringBehavior: cloudfront.OriginRequestQueryStringBehavior.all(),
      cookieBehavior: cloudfront.OriginRequestCookieBehavior.all(),
    });

    // Effectively uncached; the editor and API are dynamic
    const cachePolicy = new cloudfront.CachePolicy(this, 'CachePolicy', {
      cachePolicyName: this.resourceName('cache-policy'),
      defaultTtl: cdk.Duration.seconds(0),
      maxTtl: cdk.Duration.seconds(1),
      minTtl: cdk.Duration.seconds(0),
      enableAcceptEncodingGzip: true,
      enableAcceptEncodingBrotli: true,
      headerBehavior: cloudfront.CacheHeaderBehavior.allowList('Authorization'),
      queryStringBehavior: cloudfront.CacheQueryStringBehavior.all(),
      cookieBehavior: cloudfront.CacheCookieBehavior.all(),
    });

    const origin = new origins.HttpOrigin(
      `${api.apiId}.execute-api.${this.region}.amazonaws.com`,
      { protocolPolicy: cloudfront.OriginProtocolPolicy.HTTPS_ONLY },
    );

    const distribution = new cloudfront.Distribution(this, 'Distribution', {
      comment: `n8n distribution for ${this.config.name}`,
      defaultBehavior: {
        origin,
        viewerProtocolPolicy: cloudfront.ViewerProtocolPolicy.REDIRECT_TO_HTTPS,
        allowedMethods: cloudfront.AllowedMethods.ALLOW_ALL,
        cachePolicy,
        originRequestPolicy,
      },
      ...(certificate && domainName ? { certificate, domainNames: [domainName] } : {}),
      minimumProtocolVersion: cloudfront.SecurityPolicyProtocol.TLS_V1_2_2021,
      priceClass: this.isDevelopment
        ? cloudfront.PriceClass.PRICE_CLASS_100
        : cloudfront.PriceClass.PRICE_CLASS_ALL,
      httpVersion: cloudfront.HttpVersion.HTTP2_AND_3,
      enableIpv6: true,
      webAclId: firewall?.webAcl.attrArn,
    });

    // Webhooks and the REST API are never cached
    for (const pathPattern of ['/webhook/*', '/rest/*']) {
      distribution.addBehavior(pathPattern, origin, {
        viewerProtocolPolicy: cloudfront.ViewerProtocolPolicy.HTTPS_ONLY,
        allowedMethods: cloudfront.AllowedMethods.ALLOW_ALL,
        cachePolicy: cloudfront.CachePolicy.CACHING_DISABLED,
        originRequestPolicy,
      });
    }

    return { distribution, customDomain: certificate ? domainName : undefined };
  }

  private createDomainRecord(
    domainName: string,
    distribution: cloudfront.Distribution | undefined,
    customDomain: string | undefined,
  ): void {
    if (!distribution) {
      this.reportSoftDegrade('custom domain record', 'edge distribution');
      return;
    }
    // An alias to a distribution that does not serve the name answers 403
    if (customDomain !== domainName) {
      this.reportSoftDegrade('custom domain record', 'shared certificate');
      return;
    }
    const zoneId = this.sharedResource('networking', 'route53ZoneId');
    if (!zoneId) {
      this.reportSoftDegrade('custom domain record', 'hosted zone');
      return;
    }

    const zone = route53.HostedZone.fromHostedZoneAttributes(this, 'HostedZone', {
      hostedZoneId: zoneId,
      zoneName: zoneNameFor(domainName),
    });

    new route53.ARecord(this, 'AliasRecord', {
      zone,
      recordName: domainName,
      target: route53.RecordTarget.fromAlias(new targets.CloudFrontTarget(distribution)),
    });
  }
}
