/**
 * Kubernetes API session strategies
 * @module @kuberoute/server/kubernetes/kube-config
 *
 * - in-cluster: service-account token mounted into the pod
 * - kubeconfig: a kubeconfig file (explicit path or the default lookup), optionally a context
 * - token: an explicit API server URL and bearer token
 */

import * as k8s from '@kubernetes/client-node';
import {
  ConfigurationError,
  ErrorCode,
  createServiceLogger,
  errorMessage,
  type KubernetesConfig,
} from '@kuberoute/shared';

const logger = createServiceLogger({ level: 'info' }, { component: 'kube-config' });

/**
 * Names used for the entries of a token-auth kubeconfig
 */
const TOKEN_AUTH_CLUSTER = 'kuberoute-cluster';
const TOKEN_AUTH_USER = 'kuberoute-user';
const TOKEN_AUTH_CONTEXT = 'kuberoute-context';

function loadTokenAuth(kc: k8s.KubeConfig, config: KubernetesConfig): void {
  if (!config.server || !config.token) {
    throw new ConfigurationError('Token auth needs kubernetes.server and kubernetes.token', [], ErrorCode.CONFIGURATION_INVALID);
  }

  kc.loadFromOptions({
    clusters: [
      {
        name: TOKEN_AUTH_CLUSTER,
        server: config.server,
        skipTLSVerify: config.skipTLSVerify,
        ...(config.caFile && { caFile: config.caFile }),
      },
    ],
    users: [{ name: TOKEN_AUTH_USER, token: config.token }],
    contexts: [{ name: TOKEN_AUTH_CONTEXT, cluster: TOKEN_AUTH_CLUSTER, user: TOKEN_AUTH_USER }],
    currentContext: TOKEN_AUTH_CONTEXT,
  });
}

function loadKubeconfig(kc: k8s.KubeConfig, config: KubernetesConfig): void {
  if (config.kubeconfigPath) {
    kc.loadFromFile(config.kubeconfigPath);
  } else {
    kc.loadFromDefault();
  }

  if (config.context) {
    if (!kc.getContexts().some((context) => context.name === config.context)) {
      throw new ConfigurationError(`Context '${config.context}' not found in kubeconfig`, [
        { field: 'kubernetes.context', message: 'context not found', received: config.context },
      ]);
    }
    kc.setCurrentContext(config.context);
  }
}

/**
 * Build a KubeConfig for the configured strategy.
 * Throws ConfigurationError when the strategy cannot be set up.
 */
export function createKubeConfig(config: KubernetesConfig): k8s.KubeConfig {
  const kc = new k8s.KubeConfig();

  try {
    switch (config.auth) {
      case 'in-cluster':
        kc.loadFromCluster();
        break;
      case 'kubeconfig':
        loadKubeconfig(kc, config);
        break;
      case 'token':
        loadTokenAuth(kc, config);
        break;
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw error;
    }
    throw new ConfigurationError(
      `Could not set up Kubernetes ${config.auth} auth: ${errorMessage(error)}`,
      [],
      ErrorCode.CONFIGURATION_INVALID,
      error instanceof Error ? error : undefined,
    );
  }

  const cluster = kc.getCurrentCluster();
  if (!cluster) {
    throw new ConfigurationError(`Kubernetes ${config.auth} auth yielded no current cluster`);
  }

  if (config.skipTLSVerify) {
    logger.warn('TLS verification of the Kubernetes API is disabled', { server: cluster.server });
  }
  logger.info('Kubernetes session configured', { auth: config.auth, server: cluster.server });

  return kc;
}
