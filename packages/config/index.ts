/**
 * @pkgshelf/config
 *
 * Environment and config-file helpers shared by the apps.
 */

export {
  getEnvBool,
  getEnvNumber,
  getEnvVar,
  getNodeEnv,
  isProductionEnv,
} from './app-config'
export { JsonFileError, loadOptionalJson } from './json-loader'
