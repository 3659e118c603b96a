import Logging from '@fjell/logging';

const LibLogger = Logging.getLogger('phone-metadata-cache');

export default LibLogger;
