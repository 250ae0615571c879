import { DllNode } from './dll-node';

/*
  FIFO queue: push() at the back, popFront() from the front
*/
export class Dll<TVal> {
  private _length: number;

  first: DllNode<TVal> | undefined;
  last: DllNode<TVal> | undefined;

  constructor(vals: TVal[] = []) {
    this._length = 0;
    for(let i = 0; i < vals.length; ++i) {
      this.push(vals[i]);
    }
  }

  get length() {
    return this._length;
  }

  push(val: TVal) {
    let nextNode: DllNode<TVal>;
    nextNode = DllNode.init(val);
    this._length++;
    if(
      (this.first === undefined)
      || (this.last === undefined)
    ) {
      this.first = nextNode;
      this.last = nextNode;
      return;
    }
    nextNode.prev = this.last;
    this.last.next = nextNode;
    this.last = nextNode;
  }

  popFront(): TVal | undefined {
    let currFirst: DllNode<TVal> | undefined;
    let val: TVal;
    currFirst = this.first;
    if(currFirst === undefined) {
      return undefined;
    }
    this._length--;
    val = currFirst.val;
    if(currFirst.next === undefined) {
      // no more nodes, unset first and last
      this.first = undefined;
      this.last = undefined;
    } else {
      this.first = currFirst.next;
      this.first.prev = undefined;
    }
    currFirst.$destroy();
    return val;
  }

  /*
    empties the list, returning the removed values in order
  */
  drain(): TVal[] {
    let vals: TVal[];
    vals = [ ...this ];
    while(this.first !== undefined) {
      this.popFront();
    }
    return vals;
  }

  *[Symbol.iterator]() {
    let currNode: DllNode<TVal> | undefined;
    currNode = this.first;
    while(currNode !== undefined) {
      yield currNode.val;
      currNode = currNode.next;
    }
  }
}
