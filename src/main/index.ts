import log from './utils/logger';
import { createProgram } from './cli-handlers';
import { errorMessage } from './utils/errors';

// 进度消息已经输出到终端，控制台只显示警告和错误
log.transports.file.level = 'info';
log.transports.console.level = 'warn';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    log.error(`未处理的错误: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
