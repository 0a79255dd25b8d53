import log from 'electron-log/node';

export const renameLog = log.scope('rename');
export const storeLog = log.scope('store');

export default log;
