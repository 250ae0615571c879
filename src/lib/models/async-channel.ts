import { Deferred } from '../util/deferred';
import { Dll } from './lists/dll';

/*
  Unbounded single-producer message channel. The producer push()es
    and eventually close()s; consumers drain it with for await.
*/
export class AsyncChannel<T> implements AsyncIterable<T> {
  private buffer: Dll<T>;
  private readers: Dll<Deferred<IteratorResult<T, undefined>>>;
  private _closed: boolean;
  private failure: { err: unknown } | undefined;

  constructor() {
    this.buffer = new Dll();
    this.readers = new Dll();
    this._closed = false;
    this.failure = undefined;
  }

  get closed(): boolean {
    return this._closed;
  }

  push(val: T) {
    let reader: Deferred<IteratorResult<T, undefined>> | undefined;
    if(this._closed) {
      throw new Error('Attempt to push to a closed channel');
    }
    reader = this.readers.popFront();
    if(reader !== undefined) {
      reader.resolve({
        done: false,
        value: val,
      });
      return;
    }
    this.buffer.push(val);
  }

  close() {
    let reader: Deferred<IteratorResult<T, undefined>> | undefined;
    if(this._closed) {
      return;
    }
    this._closed = true;
    while((reader = this.readers.popFront()) !== undefined) {
      reader.resolve({
        done: true,
        value: undefined,
      });
    }
  }

  /*
    Closes the channel; once the buffer drains, readers reject with err.
  */
  fail(err: unknown) {
    let reader: Deferred<IteratorResult<T, undefined>> | undefined;
    if(this._closed) {
      return;
    }
    this._closed = true;
    this.failure = {
      err,
    };
    while((reader = this.readers.popFront()) !== undefined) {
      reader.reject(err);
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    let reader: Deferred<IteratorResult<T, undefined>>;
    let bufferedVal: T;
    if(this.buffer.first !== undefined) {
      bufferedVal = this.buffer.first.val;
      this.buffer.popFront();
      return Promise.resolve({
        done: false,
        value: bufferedVal,
      });
    }
    if(this.failure !== undefined) {
      return Promise.reject(this.failure.err);
    }
    if(this._closed) {
      return Promise.resolve({
        done: true,
        value: undefined,
      });
    }
    reader = Deferred.init<IteratorResult<T, undefined>>();
    this.readers.push(reader);
    return reader.promise;
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
    };
  }
}
