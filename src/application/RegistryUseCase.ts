import { InvalidLabelError, PathNotFoundError } from '../domain/errors/DomainErrors.js';
import { PathIdentifier } from '../domain/value-objects/PathIdentifier.js';
import { PathRational } from '../domain/value-objects/PathRational.js';
import { comparePaths } from '../domain/value-objects/PathOrder.js';
import type { PathStorePort } from '../domain/ports/PathStorePort.js';
import type { StoredPath } from '../domain/entities/StoredPath.js';
import type { StoredPathView } from './dto/StoredPathView.js';
import { Logger } from '../shared/Logger.js';

/**
 * Registry Use Case
 *
 * 以 label 保存路徑識別值，透過 PathStorePort 持久化。
 * descendants 依文件順序回傳位於某個已存路徑之下的所有已存路徑。
 */
export class RegistryUseCase {
  constructor(
    private readonly store: PathStorePort,
    private readonly logger: Logger = new Logger('RegistryUseCase'),
  ) {}

  /** 保存點分隔文字路徑；label 已存在時覆寫 */
  save(label: string, pathText: string): StoredPath {
    this.assertLabel(label);
    const id = PathIdentifier.parse(pathText);
    const stored = this.store.save(label, id);

    this.logger.info('Path saved', { label, path: id.toString(), components: id.toComponents() });
    return stored;
  }

  /** 取得 label 對應的路徑；不存在時丟出 PathNotFoundError */
  lookup(label: string): StoredPath {
    const stored = this.store.get(label);
    if (!stored) {
      throw new PathNotFoundError(label);
    }
    return stored;
  }

  list(): StoredPath[] {
    return this.store.list();
  }

  remove(label: string): boolean {
    const removed = this.store.remove(label);
    if (removed) {
      this.logger.info('Path removed', { label });
    } else {
      this.logger.debug('Nothing to remove', { label });
    }
    return removed;
  }

  /** label 對應路徑之下（不含自身）的已存路徑，依文件順序 */
  descendants(label: string): StoredPath[] {
    const ancestor = this.lookup(label);
    return this.store
      .list()
      .filter((candidate) => ancestor.id.isAncestorOf(candidate.id))
      .sort((x, y) => comparePaths(x.id, y.id) || x.label.localeCompare(y.label));
  }

  toView(stored: StoredPath): StoredPathView {
    return {
      label: stored.label,
      path: stored.id.toString(),
      rational: PathRational.fromIdentifier(stored.id).toFractionString(),
      createdAt: new Date(stored.createdAt).toISOString(),
    };
  }

  private assertLabel(label: string): void {
    if (label === '' || label.trim() !== label) {
      throw new InvalidLabelError(label);
    }
  }
}
