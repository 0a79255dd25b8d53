import type Conf from 'conf';
import { z } from 'zod';
import { storeLog } from '../utils/logger';
import { errorMessage } from '../utils/errors';

export const PROJECT_NAME = 'sheet-index-renamer';

// 定义存储的配置类型，每个字段解析失败时回退到默认值
export const settingsSchema = z.object({
  indexPath: z.string().catch(''),
  targetFolder: z.string().catch(''),
  extension: z.string().catch('.pdf'),
  mode: z.enum(['prefix', 'replace']).catch('prefix'),
  backup: z.boolean().catch(true),
  recursive: z.boolean().catch(false),
  autoPull: z.boolean().catch(true),
  delimiter: z.string().catch('-'),
  collisionPolicy: z.enum(['case-sensitive', 'case-insensitive', 'platform']).catch('platform'),
});

export type StoreSchema = z.infer<typeof settingsSchema>;

export const DEFAULT_SETTINGS: StoreSchema = settingsSchema.parse({});

export interface StoreOptions {
  /** 配置文件所在目录，默认为系统的用户配置目录 */
  cwd?: string;
}

// conf (v10 以上) 是 ES 模块，使用动态导入加载
let storeInstance: Conf<StoreSchema> | null = null;

export async function createStore(options: StoreOptions = {}): Promise<Conf<StoreSchema>> {
  const { default: Store } = await import('conf');
  return new Store<StoreSchema>({
    projectName: PROJECT_NAME,
    configName: 'config',
    cwd: options.cwd,
    defaults: DEFAULT_SETTINGS,
    // 配置文件损坏时清空，不影响启动
    clearInvalidConfig: true,
  });
}

export async function getStore(): Promise<Conf<StoreSchema>> {
  if (!storeInstance) {
    storeInstance = await createStore();
  }
  return storeInstance;
}

/**
 * 读取配置，缺失或无效的字段使用默认值
 */
export function loadSettings(store: Conf<StoreSchema>): StoreSchema {
  try {
    return settingsSchema.parse(store.store);
  } catch (error) {
    storeLog.warn(`配置无法读取，使用默认值: ${errorMessage(error)}`);
    return { ...DEFAULT_SETTINGS };
  }
}

export function saveSettings(store: Conf<StoreSchema>, settings: Partial<StoreSchema>): void {
  for (const [key, value] of Object.entries(settingsSchema.partial().parse(settings))) {
    if (value !== undefined) {
      store.set(key, value);
    }
  }
}

export function resetSettings(store: Conf<StoreSchema>): void {
  store.clear();
}
